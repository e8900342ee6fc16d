/**
 * Resolver Module
 * Settles the target MIME type, explicit or inferred from the output name
 *
 * Writes to context:
 * - targetFormat
 */

import { ConversionError, formatFlag, inferTargetFormat } from "../utils";
import type { ConversionContext } from "../types";

export function resolveFormat(ctx: ConversionContext): void {
  const { outputPath, targetFormat } = ctx.request;

  if (targetFormat) {
    ctx.logger.debug(`Using explicit target MIME type: ${targetFormat}`);
    ctx.targetFormat = targetFormat;
    return;
  }

  const inferred = inferTargetFormat(outputPath);
  if (!inferred) {
    throw new ConversionError(
      "unresolved-target-format",
      `Could not infer target MIME type from output file extension: ${formatFlag(outputPath)}.  Please specify --target_mime.`,
    );
  }

  ctx.logger.info(`Inferred target MIME type: ${inferred}`);
  ctx.targetFormat = inferred;
}
