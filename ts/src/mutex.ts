import { PoisonedLockError } from "./errors.js";

/**
 * Exclusive access to a value for the length of one synchronous call.
 *
 * A callback that throws leaves the mutex poisoned: the error propagates and
 * every later lock() throws PoisonedLockError.
 */
export class Mutex<T> {
  #value: T;
  #locked = false;
  #poisoned = false;

  constructor(value: T) {
    this.#value = value;
  }

  get isLocked(): boolean {
    return this.#locked;
  }

  get isPoisoned(): boolean {
    return this.#poisoned;
  }

  lock<R>(fn: (value: T) => R): R {
    if (this.#poisoned) throw new PoisonedLockError();
    // A second acquisition from inside the window would deadlock a real lock.
    if (this.#locked) throw new Error("mutex already locked by the current caller");

    this.#locked = true;
    try {
      return fn(this.#value);
    } catch (e) {
      this.#poisoned = true;
      throw e;
    } finally {
      this.#locked = false;
    }
  }
}
