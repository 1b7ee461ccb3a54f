// In-memory stand-in for a bidirectional byte stream.

import type { Logger } from "winston";
import { ByteBuffer } from "./bytebuffer.js";
import type { ReadWriter } from "./io.js";
import defaultLogger from "./log.js";

export interface MockStreamOptions {
  log?: Logger;
}

/**
 * Stores what is written and hands out what was pushed to read.
 *
 * @example
 * const s = new MockStream();
 * s.pushBytesToRead(new Uint8Array([1, 2, 3, 4]));
 * const buf = new Uint8Array(4);
 * s.read(buf); // 4
 * s.write(new Uint8Array([4, 3, 2, 1]));
 * s.popBytesWritten(); // Uint8Array [4, 3, 2, 1]
 */
export class MockStream implements ReadWriter {
  private readBuffer = new ByteBuffer();
  private writeBuffer = new ByteBuffer();
  private log: Logger;

  constructor({ log = defaultLogger }: MockStreamOptions = {}) {
    this.log = log.child({ class: this.constructor.name });
  }

  /** Number of pushed bytes not yet read. */
  get bytesToRead(): number {
    return this.readBuffer.length;
  }

  read(buf: Uint8Array): number {
    if (buf.length === 0) return 0;
    return this.readBuffer.readInto(buf);
  }

  write(data: Uint8Array): number {
    this.writeBuffer.push(data);
    return data.length;
  }

  flush(): void {}

  /** Queue bytes for later reads, behind any still unread. */
  pushBytesToRead(bytes: Uint8Array): void {
    this.readBuffer.push(bytes);
    this.log.debug("Queued bytes to read", {
      pushed: bytes.length,
      pending: this.readBuffer.length,
    });
  }

  /** Everything written so far, in order. Clears the write buffer. */
  popBytesWritten(): Uint8Array {
    const written = this.writeBuffer.take();
    this.log.debug("Popped written bytes", { popped: written.length });
    return written;
  }

  /** Everything written so far, without clearing. */
  peekBytesWritten(): Uint8Array {
    return this.writeBuffer.peek();
  }

  /** Independent copy of both buffers. */
  clone(): MockStream {
    const copy = new MockStream({ log: this.log });
    copy.readBuffer = this.readBuffer.clone();
    copy.writeBuffer = this.writeBuffer.clone();
    return copy;
  }
}
