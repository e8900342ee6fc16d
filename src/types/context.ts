/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { Logger } from "../utils/logger";
import type {
  ConversionCommand,
  ConversionRequest,
  ProcessOutcome,
  ProcessRunner,
} from "./conversion";

export interface ConversionContext {
  // Input - provided at initialization
  request: ConversionRequest;
  logger: Logger;
  runner: ProcessRunner;
  timeout: number;

  targetFormat?: string; // Written by resolveFormat
  inputPath?: string; // Canonical paths, written by build
  outputPath?: string;
  command?: ConversionCommand; // Written by build
  outcome?: ProcessOutcome; // Written by execute
}
