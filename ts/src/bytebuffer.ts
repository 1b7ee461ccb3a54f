/** FIFO of byte chunks with partial, in-order consumption. */
export class ByteBuffer {
  private chunks: Uint8Array[] = [];
  private totalLen = 0;

  get length(): number {
    return this.totalLen;
  }

  /** Append a copy of `data` to the tail. */
  push(data: Uint8Array): void {
    if (data.length === 0) return;
    this.chunks.push(data.slice());
    this.totalLen += data.length;
  }

  /** Move up to `buf.length` bytes from the head into `buf`. Returns the count. */
  readInto(buf: Uint8Array): number {
    const n = Math.min(buf.length, this.totalLen);
    let offset = 0;
    while (offset < n) {
      const chunk = this.chunks[0];
      const take = Math.min(chunk.length, n - offset);
      buf.set(chunk.subarray(0, take), offset);
      offset += take;
      if (take === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(take);
      }
    }
    this.totalLen -= n;
    return n;
  }

  /** Contents as one contiguous array, without consuming. */
  peek(): Uint8Array {
    const out = new Uint8Array(this.totalLen);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  /** Remove and return everything. */
  take(): Uint8Array {
    const out = this.peek();
    this.clear();
    return out;
  }

  clear(): void {
    this.chunks = [];
    this.totalLen = 0;
  }

  clone(): ByteBuffer {
    const copy = new ByteBuffer();
    copy.push(this.peek());
    return copy;
  }
}
