/**
 * Unit tests for the scratch value model
 */

import { describe, it, expect } from '@jest/globals';
import {
  ValueKind,
  describeKind,
  fromPlain,
  mapping,
  numeric,
  sequence,
  text,
  toPlain,
} from '../../src/core/types/value.js';
import type { ScratchValue } from '../../src/core/types/value.js';

describe('Scratch values', () => {
  describe('fromPlain', () => {
    it('should tag scalars', () => {
      expect(fromPlain(3)).toEqual({ kind: ValueKind.NUMERIC, value: 3 });
      expect(fromPlain(3n)).toEqual({ kind: ValueKind.NUMERIC, value: 3n });
      expect(fromPlain('x')).toEqual({ kind: ValueKind.TEXT, value: 'x' });
    });

    it('should convert arrays to sequences', () => {
      expect(fromPlain([1, 'a'])).toEqual(sequence([numeric(1), text('a')]));
    });

    it('should convert objects to mappings', () => {
      const value = fromPlain({ a: 1, nested: { b: ['c'] } });

      expect(value.kind).toBe(ValueKind.MAPPING);
      expect(value).toEqual(
        mapping(
          new Map<string, ScratchValue>([
            ['a', numeric(1)],
            ['nested', mapping(new Map<string, ScratchValue>([['b', sequence([text('c')])]]))],
          ])
        )
      );
    });
  });

  describe('toPlain', () => {
    it('should rebuild nested structures', () => {
      const plain = { list: [1, { deep: 'yes' }], count: 2n };
      expect(toPlain(fromPlain(plain))).toEqual(plain);
    });

    it('should keep a __proto__ map key as an own property', () => {
      const value = mapping(new Map<string, ScratchValue>([['__proto__', text('kept')]]));
      const plain = toPlain(value);

      expect(Object.keys(plain)).toEqual(['__proto__']);
      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    });
  });

  describe('kinds', () => {
    it('should describe bigint numerics separately', () => {
      expect(describeKind(numeric(1))).toBe('numeric');
      expect(describeKind(numeric(1n))).toBe('numeric (bigint)');
      expect(describeKind(mapping())).toBe('mapping');
    });
  });
});
