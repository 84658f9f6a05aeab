import { ExplicitBug } from "./errors.js";

/**
 * Mutual-exclusion cell for session-wide tables.
 *
 * The critical section is the callback passed to `withLock`; it must not
 * acquire the same lock again. Re-entry is an internal bug, not a wait.
 */
export class Lock<T> {
  private held = false;

  constructor(private readonly value: T) {}

  withLock<R>(fn: (value: T) => R): R {
    if (this.held) {
      throw new ExplicitBug("lock is already held");
    }
    this.held = true;
    try {
      return fn(this.value);
    } finally {
      this.held = false;
    }
  }

  get isHeld(): boolean {
    return this.held;
  }
}
