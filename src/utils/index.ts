/**
 * Utility exports
 */

// Errors
export { ConversionError, toConversionError, hasErrorCode } from "./errors";
export type { ConversionErrorReason } from "./errors";

// Logging
export { Logger } from "./logger";
export type { LoggerOptions, LogSink } from "./logger";

// Path/filename utilities
export { canonicalPath } from "./canonical-path";
export { formatFlag } from "./format-flag";
export { inferTargetFormat } from "./infer-target-format";

// Filesystem utilities
export { isFile } from "./is-file";

// Process utilities
export { execaRunner, createExecaRunner } from "./process-runner";
export type { Spawn, SpawnResult } from "./process-runner";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  describeConfigError,
} from "./load-config";

// Output
export { formatStatus } from "./format-status";
