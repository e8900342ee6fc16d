/**
 * Builder Module
 * Canonicalizes paths and assembles the unoconv argument vector
 *
 * Writes to context:
 * - inputPath, outputPath: absolute, symlink-free
 * - command: [tool, "-f", <output extension>, "-o", <output>, <input>]
 */

import { canonicalPath, formatFlag } from "../utils";
import type { ConversionContext } from "../types";

const DEFAULT_TOOL = "unoconv";

export async function build(ctx: ConversionContext): Promise<void> {
  if (!ctx.targetFormat) {
    throw new Error("Resolver must run before builder");
  }

  const inputPath = await canonicalPath(ctx.request.inputPath);
  const outputPath = await canonicalPath(ctx.request.outputPath);

  // The -f flag always comes from the output extension, even when an
  // explicit MIME type was supplied
  ctx.inputPath = inputPath;
  ctx.outputPath = outputPath;
  ctx.command = {
    file: ctx.request.toolPath ?? DEFAULT_TOOL,
    args: ["-f", formatFlag(outputPath), "-o", outputPath, inputPath],
  };
}
