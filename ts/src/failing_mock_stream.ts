// Stream that fails a fixed number of times, then behaves as an empty stream.

import type { Logger } from "winston";
import { type ErrorKind, StreamError } from "./errors.js";
import type { ReadWriter } from "./io.js";
import defaultLogger from "./log.js";

export interface FailingMockStreamOptions {
  log?: Logger;
}

/**
 * Throws StreamError(kind, message) on the first `repeat` read or write calls.
 * Reads and writes draw from one shared counter. Once exhausted, reads return
 * 0 and writes accept (and discard) everything. A negative `repeat` never
 * runs out.
 *
 * @example
 * const input = chain(
 *   new Cursor(encode("1234")),
 *   new FailingMockStream("Other", "Failing", 3),
 *   new Cursor(encode("5678")),
 * );
 * // fails unless the reader retries at least 3 times
 * expect(new CountIo().readData(input)).toBe(8);
 */
export class FailingMockStream implements ReadWriter {
  readonly kind: ErrorKind;
  readonly message: string;
  private remaining: number;
  private log: Logger;

  constructor(
    kind: ErrorKind,
    message: string,
    repeat: number,
    { log = defaultLogger }: FailingMockStreamOptions = {},
  ) {
    if (!Number.isInteger(repeat)) {
      throw new StreamError("InvalidInput", `repeat must be an integer, got ${repeat}`);
    }
    this.kind = kind;
    this.message = message;
    this.remaining = repeat;
    this.log = log.child({ class: this.constructor.name });
  }

  get remainingFailures(): number {
    return this.remaining;
  }

  get isExhausted(): boolean {
    return this.remaining === 0;
  }

  read(_buf: Uint8Array): number {
    this.maybeFail("read");
    return 0;
  }

  write(data: Uint8Array): number {
    this.maybeFail("write");
    return data.length;
  }

  flush(): void {}

  private maybeFail(op: "read" | "write"): void {
    if (this.remaining === 0) return;
    if (this.remaining > 0) this.remaining -= 1;
    this.log.debug("Injecting stream failure", {
      op,
      kind: this.kind,
      remaining: this.remaining,
    });
    throw new StreamError(this.kind, this.message);
  }
}
