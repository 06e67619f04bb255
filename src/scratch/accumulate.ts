/**
 * Accumulation Rules for Rendermark Scratch
 *
 * Combines a stored value with an addend:
 * - sequence + sequence appends the addend's items
 * - sequence + anything else appends the addend as one item
 * - numeric + numeric adds
 * - text + text concatenates
 * Every other pair is an error.
 */

import { ArithmeticError, TypeMismatchError } from '../core/errors/scratch-error.js';
import type {
  NumericValue,
  ScalarValue,
  ScratchValue,
  SequenceValue,
  TextValue,
} from '../core/types/value.js';
import { ValueKind, describeKind, numeric, sequence, text } from '../core/types/value.js';

/**
 * Integers add exactly: bigint + bigint, or bigint + a safe-integer number,
 * gives a bigint. A fractional or unsafe number on either side promotes the
 * sum to number.
 */
export function addNumeric(left: NumericValue, right: NumericValue): NumericValue {
  const a = left.value;
  const b = right.value;

  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return numeric(a + b);
  }
  if (typeof a === 'bigint' && Number.isSafeInteger(b)) {
    return numeric(a + BigInt(b));
  }
  if (typeof b === 'bigint' && Number.isSafeInteger(a)) {
    return numeric(BigInt(a) + b);
  }
  return numeric(Number(a) + Number(b));
}

export function concatText(left: TextValue, right: TextValue): TextValue {
  return text(left.value + right.value);
}

export function appendToSequence(existing: SequenceValue, addend: ScratchValue): SequenceValue {
  if (addend.kind === ValueKind.SEQUENCE) {
    return sequence([...existing.items, ...addend.items]);
  }
  return sequence([...existing.items, addend]);
}

function addScalar(key: string, existing: ScalarValue, addend: ScratchValue): ScalarValue {
  if (existing.kind === ValueKind.NUMERIC && addend.kind === ValueKind.NUMERIC) {
    return addNumeric(existing, addend);
  }
  if (existing.kind === ValueKind.TEXT && addend.kind === ValueKind.TEXT) {
    return concatText(existing, addend);
  }

  throw new ArithmeticError({ key, left: describeKind(existing), right: describeKind(addend) });
}

/**
 * Compute the value stored at key after adding addend to existing.
 * Neither input is modified.
 */
export function accumulate(key: string, existing: ScratchValue, addend: ScratchValue): ScratchValue {
  switch (existing.kind) {
    case ValueKind.SEQUENCE:
      return appendToSequence(existing, addend);
    case ValueKind.NUMERIC:
    case ValueKind.TEXT:
      return addScalar(key, existing, addend);
    case ValueKind.MAPPING:
      throw new TypeMismatchError({
        key,
        expected: 'numeric, text or sequence',
        actual: ValueKind.MAPPING,
      });
  }
}
