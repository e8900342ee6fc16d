/**
 * Executor Module
 * Runs the converter and turns a non-zero exit into a ConversionError
 *
 * Writes to context:
 * - outcome
 */

import { ConversionError } from "../utils";
import type { ConversionContext } from "../types";

export async function execute(ctx: ConversionContext): Promise<void> {
  if (!ctx.command || !ctx.outputPath) {
    throw new Error("Builder must run before executor");
  }

  const { file, args } = ctx.command;
  ctx.logger.info(`Executing command: ${[file, ...args].join(" ")}`);

  const outcome = await ctx.runner.run(file, args, { timeout: ctx.timeout });
  ctx.outcome = outcome;

  if (outcome.exitCode !== 0) {
    const status =
      outcome.exitCode === null
        ? `terminated by signal ${outcome.signal ?? "unknown"}`
        : `return code ${outcome.exitCode}`;
    throw new ConversionError(
      "conversion-failed",
      `Conversion failed with ${status}`,
      {
        exitCode: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
      },
    );
  }

  ctx.logger.info(`Conversion successful. Output file: ${ctx.outputPath}`);
}
