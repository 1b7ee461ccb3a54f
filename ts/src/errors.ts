// Error types raised by mock streams and the read/write helpers.

/** Categorical I/O error kinds a stream failure can carry. */
export type ErrorKind =
  | "NotFound"
  | "PermissionDenied"
  | "ConnectionRefused"
  | "ConnectionReset"
  | "ConnectionAborted"
  | "NotConnected"
  | "BrokenPipe"
  | "WouldBlock"
  | "InvalidInput"
  | "InvalidData"
  | "TimedOut"
  | "WriteZero"
  | "Interrupted"
  | "UnexpectedEof"
  | "Other";

/**
 * A failed read or write. End-of-stream is never a StreamError: readers
 * report it by returning 0.
 */
export class StreamError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "StreamError";
    this.kind = kind;
  }
}

/** Raised by every access to a lock after a failure inside its critical section. */
export class PoisonedLockError extends Error {
  constructor(message = "lock poisoned by a failure inside an access window") {
    super(message);
    this.name = "PoisonedLockError";
  }
}

export function isStreamError(value: unknown, kind?: ErrorKind): value is StreamError {
  return value instanceof StreamError && (kind === undefined || value.kind === kind);
}
