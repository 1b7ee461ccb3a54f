// Shared handle over one MockStream.

import type { Logger } from "winston";
import { PoisonedLockError } from "./errors.js";
import type { ReadWriter } from "./io.js";
import defaultLogger from "./log.js";
import { MockStream } from "./mock_stream.js";
import { Mutex } from "./mutex.js";

export interface SharedMockStreamOptions {
  log?: Logger;
}

/**
 * Lock-guarded MockStream shared between handles. clone() returns another
 * handle to the same buffers, so a test can keep one handle for assertions
 * while the code under test holds the other.
 */
export class SharedMockStream implements ReadWriter {
  private mutex: Mutex<MockStream>;
  private log: Logger;

  /** Pass `mutex` to make this a handle onto an existing guarded stream. */
  constructor({ log = defaultLogger }: SharedMockStreamOptions = {}, mutex?: Mutex<MockStream>) {
    this.mutex = mutex ?? new Mutex(new MockStream({ log }));
    this.log = log.child({ class: this.constructor.name });
  }

  /** Another handle to the same underlying stream. */
  clone(): SharedMockStream {
    return new SharedMockStream({ log: this.log }, this.mutex);
  }

  read(buf: Uint8Array): number {
    return this.with((s) => s.read(buf));
  }

  write(data: Uint8Array): number {
    return this.with((s) => s.write(data));
  }

  flush(): void {
    this.with((s) => s.flush());
  }

  pushBytesToRead(bytes: Uint8Array): void {
    this.with((s) => s.pushBytesToRead(bytes));
  }

  popBytesWritten(): Uint8Array {
    return this.with((s) => s.popBytesWritten());
  }

  peekBytesWritten(): Uint8Array {
    return this.with((s) => s.peekBytesWritten());
  }

  /**
   * Run `fn` with exclusive access to the underlying stream. The stream must
   * not escape `fn`: a reference kept past the call is unguarded.
   */
  with<R>(fn: (stream: MockStream) => R): R {
    try {
      return this.mutex.lock(fn);
    } catch (e) {
      if (this.mutex.isPoisoned && !(e instanceof PoisonedLockError)) {
        this.log.error("Shared mock stream lock poisoned", {
          error: e instanceof Error ? e.message : String(e),
        });
      }
      throw e;
    }
  }
}
