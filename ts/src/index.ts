// Public API
export { MockStream } from "./mock_stream.js";
export { SharedMockStream } from "./shared_mock_stream.js";
export { FailingMockStream } from "./failing_mock_stream.js";
export { StreamError, PoisonedLockError, isStreamError } from "./errors.js";
export {
  Cursor,
  Chain,
  chain,
  readExact,
  readToEnd,
  writeAll,
  bytes,
  concat,
} from "./io.js";
export { Mutex } from "./mutex.js";
export { ByteBuffer } from "./bytebuffer.js";
export type { ErrorKind } from "./errors.js";
export type { Reader, Writer, ReadWriter } from "./io.js";
export type { MockStreamOptions } from "./mock_stream.js";
export type { SharedMockStreamOptions } from "./shared_mock_stream.js";
export type { FailingMockStreamOptions } from "./failing_mock_stream.js";
