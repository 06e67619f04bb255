/**
 * Read/Write Guard for Rendermark Scratch
 *
 * Every store operation runs inside a guarded section: reads share access,
 * writes hold it exclusively. Sections are synchronous, so callers on the same
 * event loop are serialized per operation; a conflicting acquisition can only
 * come from code that re-enters a store mid-operation, and is rejected.
 */

import { GuardViolationError } from '../errors/scratch-error.js';

/**
 * Guard access modes
 */
export const GuardMode = {
  IDLE: 'idle',
  READ: 'read',
  WRITE: 'write',
} as const;

export type GuardModeValue = (typeof GuardMode)[keyof typeof GuardMode];

export interface GuardState {
  readonly mode: GuardModeValue;
  /** Number of shared holders; 0 unless mode is READ */
  readonly readers: number;
}

export class ReadWriteGuard {
  private readers = 0;
  private writing = false;

  /**
   * Run an operation with shared access
   */
  read<T>(operation: () => T): T {
    if (this.writing) {
      throw new GuardViolationError('read', 'write');
    }

    this.readers += 1;
    try {
      return operation();
    } finally {
      this.readers -= 1;
    }
  }

  /**
   * Run an operation with exclusive access
   */
  write<T>(operation: () => T): T {
    if (this.writing) {
      throw new GuardViolationError('write', 'write');
    }
    if (this.readers > 0) {
      throw new GuardViolationError('write', 'read');
    }

    this.writing = true;
    try {
      return operation();
    } finally {
      this.writing = false;
    }
  }

  get state(): GuardState {
    if (this.writing) {
      return { mode: GuardMode.WRITE, readers: 0 };
    }
    return { mode: this.readers > 0 ? GuardMode.READ : GuardMode.IDLE, readers: this.readers };
  }
}
