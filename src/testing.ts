/**
 * Public test utilities — exported from the `"validation-logger/testing"` entry point.
 */
export type { RecordedLine } from "./testing/recording-logger.js";
export { RecordingLogger } from "./testing/recording-logger.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
