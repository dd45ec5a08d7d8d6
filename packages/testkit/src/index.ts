/**
 * Test doubles shared by spanstore packages
 */

export { RecordingStoreClient } from "./store-client.js";
export type { FailureRule, StoreOperation } from "./store-client.js";
export { ManualClock, HOUR_MS } from "./clock.js";
export { makeSpan, makeServiceSpan } from "./spans.js";
export { createTempDir, removeDir, writeTextFile } from "./fs.js";
export { RecordingLogger } from "./logger.js";
export type { RecordedLog } from "./logger.js";
