import type { Reader } from "mockstream/io.js";

/**
 * Counts the bytes a reader yields, retrying up to `retries` failures. Once
 * they are used up, the next failure ends the count.
 */
export class CountIo {
  readData(r: Reader, retries = 3): number {
    let count = 0;
    let left = retries;
    const buffer = new Uint8Array(5);
    for (;;) {
      let n: number;
      try {
        n = r.read(buffer);
      } catch {
        if (left === 0) break;
        left -= 1;
        continue;
      }
      if (n === 0) break;
      count += n;
    }
    return count;
  }
}
