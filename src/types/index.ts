/**
 * Central type exports
 */

// Configuration
export type {
  ConverterConfig,
  LoggingConfig,
  LogLevel,
  PartialConverterConfig,
  ConfigError,
} from "./config";
export {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
  LogLevelSchema,
  MAX_TIMEOUT,
} from "./config";

// Conversion
export type {
  ConversionRequest,
  ConvertOptions,
  ConversionCommand,
  ProcessOutcome,
  ProcessRunner,
  RunOptions,
  ConversionResult,
  ConversionSuccess,
  ConversionFailure,
} from "./conversion";

// Context
export type { ConversionContext } from "./context";
