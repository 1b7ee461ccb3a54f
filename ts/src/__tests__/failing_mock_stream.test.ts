import { describe, it, expect } from "vitest";
import { FailingMockStream } from "../failing_mock_stream.js";
import { StreamError } from "../errors.js";
import { MockStream } from "../mock_stream.js";
import { chain } from "../io.js";

function catchError(fn: () => unknown): StreamError {
  try {
    fn();
  } catch (e) {
    if (e instanceof StreamError) return e;
    throw e;
  }
  throw new Error("expected a StreamError");
}

describe("FailingMockStream", () => {
  it("read fails once, then reports end-of-stream", () => {
    const s = new FailingMockStream("BrokenPipe", "The cat unplugged the cable", 1);
    const v = new Uint8Array(4);

    const err = catchError(() => s.read(v));
    expect(err.kind).toBe("BrokenPipe");
    expect(err.message).toBe("The cat unplugged the cable");
    expect(s.read(v)).toBe(0);
  });

  it("read leaves the buffer untouched", () => {
    const s = new FailingMockStream("Other", "Failing", 1);
    const v = new Uint8Array([9, 9]);

    expect(() => s.read(v)).toThrow(StreamError);
    expect(s.read(v)).toBe(0);
    expect(v).toEqual(new Uint8Array([9, 9]));
  });

  it("negative repeat keeps failing writes", () => {
    const s = new FailingMockStream("PermissionDenied", "Access denied", -1);
    const data = new TextEncoder().encode("abcd");

    const err = catchError(() => s.write(data));
    expect(err.kind).toBe("PermissionDenied");
    expect(err.message).toBe("Access denied");
    expect(() => s.write(data)).toThrow("Access denied");
    expect(s.remainingFailures).toBe(-1);
  });

  it("repeat of 3 shares one counter between reads and writes", () => {
    const s = new FailingMockStream("TimedOut", "timed out", 3);
    const buf = new Uint8Array(2);

    expect(() => s.read(buf)).toThrow(StreamError);
    expect(() => s.write(new Uint8Array([1]))).toThrow(StreamError);
    expect(s.remainingFailures).toBe(1);
    expect(() => s.read(buf)).toThrow(StreamError);

    expect(s.isExhausted).toBe(true);
    expect(s.read(buf)).toBe(0);
    expect(s.write(new Uint8Array([1, 2, 3]))).toBe(3);
    expect(s.read(buf)).toBe(0);
    expect(s.write(new Uint8Array([1, 2, 3]))).toBe(3);
  });

  it("first 3 reads fail, later reads and writes succeed", () => {
    const s = new FailingMockStream("Other", "Failing", 3);
    const buf = new Uint8Array(2);
    for (let i = 0; i < 3; i++) {
      expect(() => s.read(buf)).toThrow(StreamError);
    }
    expect(s.read(buf)).toBe(0);
    expect(s.read(buf)).toBe(0);
    expect(s.write(new Uint8Array([1, 2]))).toBe(2);
  });

  it("repeat of 0 never fails", () => {
    const s = new FailingMockStream("Other", "Failing", 0);
    expect(s.isExhausted).toBe(true);
    expect(s.read(new Uint8Array(4))).toBe(0);
    expect(s.write(new Uint8Array([1, 2]))).toBe(2);
  });

  it("flush ignores the counter", () => {
    const s = new FailingMockStream("Other", "Failing", 2);
    s.flush();
    s.flush();
    expect(s.remainingFailures).toBe(2);
  });

  it("non-integer repeat is rejected", () => {
    const err = catchError(() => new FailingMockStream("Other", "Failing", 1.5));
    expect(err.kind).toBe("InvalidInput");
    expect(() => new FailingMockStream("Other", "Failing", Number.NaN)).toThrow(StreamError);
  });

  it("chained after a mock stream, fails after the data runs out", () => {
    const s1 = new MockStream();
    s1.pushBytesToRead(new TextEncoder().encode("abcd"));
    const c = chain(s1, new FailingMockStream("Other", "Failing", -1));

    const v = new Uint8Array(8);
    expect(c.read(v)).toBe(4);
    expect(catchError(() => c.read(v)).kind).toBe("Other");
    expect(catchError(() => c.read(v)).kind).toBe("Other");
  });
});
