// A transport the application code is written against. Tests swap the real
// socket for a shared mock without touching the code under test.

import type { ReadWriter } from "mockstream/io.js";
import type { SharedMockStream } from "mockstream/shared_mock_stream.js";

export type NetStream =
  | { kind: "mocked"; stream: SharedMockStream }
  | { kind: "socket"; stream: ReadWriter };

export function netRead(s: NetStream, buf: Uint8Array): number {
  switch (s.kind) {
    case "mocked":
      return s.stream.read(buf);
    case "socket":
      return s.stream.read(buf);
  }
}

export function netWrite(s: NetStream, data: Uint8Array): number {
  switch (s.kind) {
    case "mocked":
      return s.stream.write(data);
    case "socket":
      return s.stream.write(data);
  }
}

export function netFlush(s: NetStream): void {
  switch (s.kind) {
    case "mocked":
      s.stream.flush();
      return;
    case "socket":
      s.stream.flush();
      return;
  }
}

/** Read 4 bytes, reverse them and write them back. Returns bytes written. */
export function reverse4(s: NetStream): number {
  const v = new Uint8Array(4);
  const count = netRead(s, v);
  if (count !== 4) {
    throw new Error(`expected 4 bytes, got ${count}`);
  }
  v.reverse();
  const written = netWrite(s, v);
  netFlush(s);
  return written;
}
