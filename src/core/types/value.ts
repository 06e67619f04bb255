/**
 * Scratch Value Model for Rendermark
 *
 * Values held by a scratch store are a closed set of four kinds. Hosts talk to
 * the store in plain JavaScript values; inside the store every value is a
 * tagged variant so accumulation and shape checks can switch exhaustively.
 */

/**
 * Value kinds
 */
export const ValueKind = {
  /** number or bigint */
  NUMERIC: 'numeric',
  /** string */
  TEXT: 'text',
  /** ordered list of values */
  SEQUENCE: 'sequence',
  /** string-keyed nested mapping */
  MAPPING: 'mapping',
} as const;

export type ValueKindValue = (typeof ValueKind)[keyof typeof ValueKind];

export interface NumericValue {
  readonly kind: typeof ValueKind.NUMERIC;
  readonly value: number | bigint;
}

export interface TextValue {
  readonly kind: typeof ValueKind.TEXT;
  readonly value: string;
}

export interface SequenceValue {
  readonly kind: typeof ValueKind.SEQUENCE;
  readonly items: readonly ScratchValue[];
}

/**
 * Nested mapping. The entries map is owned by whoever built the value and is
 * never handed out to callers.
 */
export interface MappingValue {
  readonly kind: typeof ValueKind.MAPPING;
  readonly entries: Map<string, ScratchValue>;
}

export type ScalarValue = NumericValue | TextValue;

export type ScratchValue = NumericValue | TextValue | SequenceValue | MappingValue;

/**
 * Plain values exchanged with hosts
 */
export type PlainScalar = number | bigint | string;

export interface PlainMapping {
  readonly [key: string]: PlainValue;
}

export type PlainValue = PlainScalar | readonly PlainValue[] | PlainMapping;

export function numeric(value: number | bigint): NumericValue {
  return { kind: ValueKind.NUMERIC, value };
}

export function text(value: string): TextValue {
  return { kind: ValueKind.TEXT, value };
}

export function sequence(items: readonly ScratchValue[]): SequenceValue {
  return { kind: ValueKind.SEQUENCE, items };
}

export function mapping(entries: Map<string, ScratchValue> = new Map()): MappingValue {
  return { kind: ValueKind.MAPPING, entries };
}

function isPlainSequence(value: PlainValue): value is readonly PlainValue[] {
  return Array.isArray(value);
}

/**
 * Convert a plain value into its tagged form.
 * Arrays become sequences, objects become mappings; nested values are copied.
 */
export function fromPlain(value: PlainValue): ScratchValue {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return numeric(value);
  }

  if (typeof value === 'string') {
    return text(value);
  }

  if (isPlainSequence(value)) {
    return sequence(value.map(fromPlain));
  }

  const entries = new Map<string, ScratchValue>();
  for (const [key, entry] of Object.entries(value)) {
    entries.set(key, fromPlain(entry));
  }
  return mapping(entries);
}

/**
 * Convert a tagged value back to a fresh plain value
 */
export function toPlain(value: ScratchValue): PlainValue {
  switch (value.kind) {
    case ValueKind.NUMERIC:
    case ValueKind.TEXT:
      return value.value;
    case ValueKind.SEQUENCE:
      return value.items.map(toPlain);
    case ValueKind.MAPPING:
      return Object.fromEntries(
        Array.from(value.entries, ([key, entry]) => [key, toPlain(entry)] as const)
      );
  }
}

/**
 * Short human-readable description of a value's kind, used in error messages
 */
export function describeKind(value: ScratchValue): string {
  if (value.kind === ValueKind.NUMERIC) {
    return typeof value.value === 'bigint' ? 'numeric (bigint)' : 'numeric';
  }
  return value.kind;
}
