/**
 * Unit tests for the read/write guard
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { GuardMode, ReadWriteGuard } from '../../src/core/concurrency/read-write-guard.js';
import { GuardViolationError, ScratchErrorCode } from '../../src/core/errors/scratch-error.js';

describe('ReadWriteGuard', () => {
  let guard: ReadWriteGuard;

  beforeEach(() => {
    guard = new ReadWriteGuard();
  });

  it('should start idle', () => {
    expect(guard.state).toEqual({ mode: GuardMode.IDLE, readers: 0 });
  });

  it('should return the result of the guarded operation', () => {
    expect(guard.read(() => 'read')).toBe('read');
    expect(guard.write(() => 42)).toBe(42);
  });

  it('should report the mode while held', () => {
    guard.read(() => {
      expect(guard.state).toEqual({ mode: GuardMode.READ, readers: 1 });
    });
    guard.write(() => {
      expect(guard.state).toEqual({ mode: GuardMode.WRITE, readers: 0 });
    });
    expect(guard.state.mode).toBe(GuardMode.IDLE);
  });

  it('should share read access', () => {
    const readers = guard.read(() => guard.read(() => guard.state.readers));
    expect(readers).toBe(2);
  });

  it('should reject a write while reading', () => {
    expect(() => guard.read(() => guard.write(() => undefined))).toThrow(
      'Cannot acquire write access while read access is held'
    );
  });

  it('should reject any access while writing', () => {
    expect(() => guard.write(() => guard.read(() => undefined))).toThrow(GuardViolationError);
    expect(() => guard.write(() => guard.write(() => undefined))).toThrow(
      'Cannot acquire write access while write access is held'
    );
  });

  it('should release after a failed operation', () => {
    expect(() =>
      guard.write(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(guard.state.mode).toBe(GuardMode.IDLE);
    expect(guard.write(() => 'again')).toBe('again');
  });

  it('should carry a violation code', () => {
    try {
      guard.write(() => guard.read(() => undefined));
    } catch (error) {
      expect(error).toBeInstanceOf(GuardViolationError);
      if (error instanceof GuardViolationError) {
        expect(error.code).toBe(ScratchErrorCode.GUARD_VIOLATION);
        expect(error.details).toEqual({ requested: 'read', held: 'write' });
      }
    }
    expect.assertions(3);
  });
});
