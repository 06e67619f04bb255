/**
 * Scratch Store for Rendermark
 *
 * A writable context shared by the templates of one rendering pass. Values
 * can be set and read back, accumulated (added, concatenated or appended),
 * or collected into a keyed mapping and read back in key order.
 *
 * Values go in and come out as plain values; the store never hands out
 * references to what it holds.
 */

import { ReadWriteGuard } from '../core/concurrency/read-write-guard.js';
import { TypeMismatchError } from '../core/errors/scratch-error.js';
import type { MappingValue, PlainValue, ScratchValue } from '../core/types/value.js';
import { ValueKind, describeKind, fromPlain, mapping, toPlain } from '../core/types/value.js';
import { accumulate } from './accumulate.js';
import { compareKeys, sortKeys } from './ordering.js';

/**
 * Scratch store interface
 */
export interface ScratchStore {
  /**
   * Add addend to the value at key, or store it if the key is absent.
   * Throws ArithmeticError or TypeMismatchError and leaves the store unchanged
   * when the two cannot be combined.
   */
  add(key: string, addend: PlainValue): void;

  /**
   * Store value at key, replacing whatever was there
   */
  set(key: string, value: PlainValue): void;

  /**
   * Get the value at key, or undefined if nothing is stored
   */
  get(key: string): PlainValue | undefined;

  /**
   * Set mapKey to value in the mapping stored at key, creating the mapping on
   * first use
   */
  setInMap(key: string, mapKey: string, value: PlainValue): void;

  /**
   * Values of the mapping at key ordered by their map keys, or undefined if
   * nothing is stored
   */
  getSortedMapValues(key: string): PlainValue[] | undefined;

  has(key: string): boolean;

  /**
   * Remove key; absent keys are ignored
   */
  delete(key: string): void;

  /**
   * Remove mapKey from the mapping at key; absent keys and entries are ignored
   */
  deleteInMap(key: string, mapKey: string): void;

  /**
   * Stored keys in sorted order
   */
  keys(): string[];

  /**
   * Plain snapshot of everything stored
   */
  values(): Record<string, PlainValue>;

  readonly size: number;
}

/**
 * In-memory implementation of ScratchStore
 */
export class InMemoryScratchStore implements ScratchStore {
  private readonly entries = new Map<string, ScratchValue>();
  private readonly guard = new ReadWriteGuard();

  add(key: string, addend: PlainValue): void {
    const incoming = fromPlain(addend);

    this.guard.write(() => {
      const existing = this.entries.get(key);
      this.entries.set(key, existing === undefined ? incoming : accumulate(key, existing, incoming));
    });
  }

  set(key: string, value: PlainValue): void {
    const incoming = fromPlain(value);

    this.guard.write(() => {
      this.entries.set(key, incoming);
    });
  }

  get(key: string): PlainValue | undefined {
    return this.guard.read(() => {
      const value = this.entries.get(key);
      return value === undefined ? undefined : toPlain(value);
    });
  }

  setInMap(key: string, mapKey: string, value: PlainValue): void {
    const incoming = fromPlain(value);

    this.guard.write(() => {
      const existing = this.entries.get(key);
      if (existing === undefined) {
        this.entries.set(key, mapping(new Map([[mapKey, incoming]])));
        return;
      }
      this.requireMapping(key, existing).entries.set(mapKey, incoming);
    });
  }

  getSortedMapValues(key: string): PlainValue[] | undefined {
    return this.guard.read(() => {
      const existing = this.entries.get(key);
      if (existing === undefined) {
        return undefined;
      }

      const { entries } = this.requireMapping(key, existing);
      return Array.from(entries)
        .sort(([left], [right]) => compareKeys(left, right))
        .map(([, entry]) => toPlain(entry));
    });
  }

  has(key: string): boolean {
    return this.guard.read(() => this.entries.has(key));
  }

  delete(key: string): void {
    this.guard.write(() => {
      this.entries.delete(key);
    });
  }

  deleteInMap(key: string, mapKey: string): void {
    this.guard.write(() => {
      const existing = this.entries.get(key);
      if (existing !== undefined) {
        this.requireMapping(key, existing).entries.delete(mapKey);
      }
    });
  }

  keys(): string[] {
    return this.guard.read(() => sortKeys(this.entries.keys()));
  }

  values(): Record<string, PlainValue> {
    return this.guard.read(() =>
      Object.fromEntries(Array.from(this.entries, ([key, value]) => [key, toPlain(value)] as const))
    );
  }

  get size(): number {
    return this.guard.read(() => this.entries.size);
  }

  private requireMapping(key: string, value: ScratchValue): MappingValue {
    if (value.kind !== ValueKind.MAPPING) {
      throw new TypeMismatchError({ key, expected: ValueKind.MAPPING, actual: describeKind(value) });
    }
    return value;
  }
}

/**
 * Create a new, empty scratch store
 */
export function createScratchStore(): ScratchStore {
  return new InMemoryScratchStore();
}
