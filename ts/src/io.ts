// Synchronous byte stream capabilities and the helpers built on them.
//
// A read returns the number of bytes copied into the caller's buffer; 0 means
// end-of-stream for that call. Failures are thrown as StreamError.

import { StreamError, isStreamError } from "./errors.js";
import * as config from "./config.js";

export interface Reader {
  /** Copy up to `buf.length` bytes into `buf`. Returns the count, 0 at end-of-stream. */
  read(buf: Uint8Array): number;
}

export interface Writer {
  /** Write bytes from `data`. Returns how many were accepted. */
  write(data: Uint8Array): number;
  flush(): void;
}

export interface ReadWriter extends Reader, Writer {}

/** Reader over a fixed byte array. */
export class Cursor implements Reader {
  private data: Uint8Array;
  private pos = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get position(): number {
    return this.pos;
  }

  read(buf: Uint8Array): number {
    const n = Math.min(buf.length, this.data.length - this.pos);
    if (n <= 0) return 0;
    buf.set(this.data.subarray(this.pos, this.pos + n));
    this.pos += n;
    return n;
  }
}

/**
 * Reads from `first` until it reports end-of-stream, then from `second`.
 * A failure from the active reader propagates without switching readers.
 */
export class Chain implements Reader {
  private doneFirst = false;

  constructor(
    private first: Reader,
    private second: Reader,
  ) {}

  read(buf: Uint8Array): number {
    if (buf.length === 0) return 0;
    if (!this.doneFirst) {
      const n = this.first.read(buf);
      if (n > 0) return n;
      this.doneFirst = true;
    }
    return this.second.read(buf);
  }
}

export function chain(first: Reader, ...rest: Reader[]): Reader {
  return rest.reduce<Reader>((acc, next) => new Chain(acc, next), first);
}

/** Fill `buf` completely, retrying interrupted reads. */
export function readExact(reader: Reader, buf: Uint8Array): void {
  let offset = 0;
  while (offset < buf.length) {
    let n: number;
    try {
      n = reader.read(buf.subarray(offset));
    } catch (e) {
      if (isStreamError(e, "Interrupted")) continue;
      throw e;
    }
    if (n === 0) {
      throw new StreamError("UnexpectedEof", "failed to fill whole buffer");
    }
    offset += n;
  }
}

/** Read until end-of-stream and return everything read. */
export function readToEnd(reader: Reader, chunkSize: number = config.READ_CHUNK_SIZE): Uint8Array {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new StreamError("InvalidInput", `chunkSize must be a positive integer, got ${chunkSize}`);
  }
  const chunks: Uint8Array[] = [];
  let totalLen = 0;
  const scratch = new Uint8Array(chunkSize);
  for (;;) {
    let n: number;
    try {
      n = reader.read(scratch);
    } catch (e) {
      if (isStreamError(e, "Interrupted")) continue;
      throw e;
    }
    if (n === 0) break;
    chunks.push(scratch.slice(0, n));
    totalLen += n;
  }
  return concat(chunks, totalLen);
}

/** Write all of `data`, retrying interrupted writes. */
export function writeAll(writer: Writer, data: Uint8Array): void {
  let offset = 0;
  while (offset < data.length) {
    let n: number;
    try {
      n = writer.write(data.subarray(offset));
    } catch (e) {
      if (isStreamError(e, "Interrupted")) continue;
      throw e;
    }
    if (n === 0) {
      throw new StreamError("WriteZero", "failed to write whole buffer");
    }
    offset += n;
  }
}

/** Yield the reader's bytes one at a time until end-of-stream. */
export function* bytes(reader: Reader): Generator<number, void, undefined> {
  const one = new Uint8Array(1);
  for (;;) {
    let n: number;
    try {
      n = reader.read(one);
    } catch (e) {
      if (isStreamError(e, "Interrupted")) continue;
      throw e;
    }
    if (n === 0) return;
    yield one[0];
  }
}

export function concat(chunks: Uint8Array[], totalLen?: number): Uint8Array {
  const out = new Uint8Array(totalLen ?? chunks.reduce((sum, c) => sum + c.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
