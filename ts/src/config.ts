import * as env from "./lib/env.js";

export const LOG_LEVEL = env.varOrDefault("MOCKSTREAM_LOG_LEVEL", "warn").toLowerCase();
export const LOG_FORMAT = env.varOrDefault("MOCKSTREAM_LOG_FORMAT", "simple");

// Chunk size used by readToEnd when the caller does not pass one.
export const READ_CHUNK_SIZE = env.positiveIntOrDefault("MOCKSTREAM_READ_CHUNK_SIZE", 64);
