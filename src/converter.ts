/**
 * Converter
 * Runs the conversion pipeline: validate → resolve → build → execute
 */

import * as modules from "./modules";
import { Logger, execaRunner, toConversionError } from "./utils";
import type { ConversionError } from "./utils";
import type {
  ConversionContext,
  ConversionRequest,
  ConversionResult,
  ConvertOptions,
} from "./types";

/**
 * Convert a document by invoking unoconv
 *
 * Never throws: every failure comes back as `{ ok: false, error }` with a
 * reason describing which stage failed, and is logged before returning.
 *
 * @example
 * const result = await convert({ inputPath: "report.odt", outputPath: "report.pdf" });
 * if (!result.ok) console.error(result.error.reason);
 */
export async function convert(
  request: ConversionRequest,
  options: ConvertOptions = {},
): Promise<ConversionResult> {
  const ctx: ConversionContext = {
    request,
    logger: options.logger ?? new Logger(),
    runner: options.runner ?? execaRunner,
    timeout: options.timeout ?? 0,
  };

  try {
    await modules.validate(ctx);
    modules.resolveFormat(ctx);
    await modules.build(ctx);
    await modules.execute(ctx);
  } catch (thrown) {
    const error = toConversionError(thrown);
    logFailure(ctx, error);
    return { ok: false, error };
  }

  if (!ctx.targetFormat || !ctx.inputPath || !ctx.outputPath || !ctx.command || !ctx.outcome) {
    const error = toConversionError(new Error("Pipeline finished without a result"));
    logFailure(ctx, error);
    return { ok: false, error };
  }

  return {
    ok: true,
    inputPath: ctx.inputPath,
    outputPath: ctx.outputPath,
    targetFormat: ctx.targetFormat,
    command: ctx.command,
    outcome: ctx.outcome,
  };
}

/**
 * Boolean form of `convert`, true when the converter exited with status 0
 */
export async function convertFile(
  request: ConversionRequest,
  options: ConvertOptions = {},
): Promise<boolean> {
  const result = await convert(request, options);
  return result.ok;
}

function logFailure(ctx: ConversionContext, error: ConversionError): void {
  const { logger } = ctx;

  switch (error.reason) {
    case "conversion-failed":
      logger.error(error.message);
      logger.error(`Stdout: ${error.stdout ?? ""}`);
      logger.error(`Stderr: ${error.stderr ?? ""}`);
      break;
    case "unknown":
      logger.error(error.message, error.cause);
      break;
    default:
      logger.error(error.message);
  }
}

export { ConversionError } from "./utils";
export type { ConversionErrorReason } from "./utils";
export type * from "./types";
