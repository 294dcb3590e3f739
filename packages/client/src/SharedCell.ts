/**
 * @fileoverview Shared state cell with run-time checked access windows.
 *
 * Any number of shared (read) windows may be open at once, or exactly one
 * exclusive (write) window, never both. Opening a window that would break
 * this throws an AccessViolationError instead of corrupting state.
 * Windows close when the callback returns or throws; a callback that
 * returns a promise does not keep its window open across awaits.
 */

import { AccessViolationError } from './errors.js';

export type BorrowState = 'free' | 'shared' | 'exclusive';

export class SharedCell<T> {
  private readers = 0;
  private writer: string | null = null;

  constructor(private readonly value: T) {}

  /**
   * Current window state.
   */
  get state(): BorrowState {
    if (this.writer !== null) return 'exclusive';
    return this.readers > 0 ? 'shared' : 'free';
  }

  /**
   * Run `fn` inside a shared window.
   * @param purpose - Who is reading, for the violation message
   * @throws {AccessViolationError} if an exclusive window is open
   */
  read<R>(purpose: string, fn: (value: T) => R): R {
    if (this.writer !== null) {
      throw new AccessViolationError(
        `cannot read for ${purpose} while exclusively held by ${this.writer}`
      );
    }
    this.readers++;
    try {
      return fn(this.value);
    } finally {
      this.readers--;
    }
  }

  /**
   * Run `fn` inside the exclusive window.
   * @param purpose - Who is writing, for the violation message
   * @throws {AccessViolationError} if any other window is open
   */
  write<R>(purpose: string, fn: (value: T) => R): R {
    if (this.writer !== null) {
      throw new AccessViolationError(
        `cannot take exclusive access for ${purpose} while exclusively held by ${this.writer}`
      );
    }
    if (this.readers > 0) {
      throw new AccessViolationError(
        `cannot take exclusive access for ${purpose} while ${this.readers} reader(s) are active`
      );
    }
    this.writer = purpose;
    try {
      return fn(this.value);
    } finally {
      this.writer = null;
    }
  }
}
