/**
 * Conversion request, process and result types
 */

import type { ConversionError } from "../utils/errors";
import type { Logger } from "../utils/logger";

export interface ConversionRequest {
  inputPath: string;
  outputPath: string;
  // MIME type; inferred from the output extension when omitted
  targetFormat?: string;
  // Defaults to "unoconv", resolved through PATH
  toolPath?: string;
}

export interface ConvertOptions {
  logger?: Logger;
  runner?: ProcessRunner;
  // Milliseconds, 0 or undefined means wait indefinitely
  timeout?: number;
}

/**
 * Argument vector handed to the external tool.
 * `args` is always ["-f", <format flag>, "-o", <output>, <input>].
 */
export interface ConversionCommand {
  file: string;
  args: string[];
}

export interface ProcessOutcome {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeout?: number;
}

export interface ProcessRunner {
  run(file: string, args: string[], options?: RunOptions): Promise<ProcessOutcome>;
}

export interface ConversionSuccess {
  ok: true;
  inputPath: string;
  outputPath: string;
  targetFormat: string;
  command: ConversionCommand;
  outcome: ProcessOutcome;
}

export interface ConversionFailure {
  ok: false;
  error: ConversionError;
}

export type ConversionResult = ConversionSuccess | ConversionFailure;
