import { SharedMockStream } from "mockstream/shared_mock_stream.js";
import type { NetStream } from "../net_stream.js";

export const encode = (s: string) => new TextEncoder().encode(s);

/**
 * Creates a mocked NetStream plus the test's own handle to the same buffers:
 * push input and pop output through `control`, hand `net` to the code under test.
 */
export function createMockedNetStream(): { control: SharedMockStream; net: NetStream } {
  const control = new SharedMockStream();
  return { control, net: { kind: "mocked", stream: control.clone() } };
}
