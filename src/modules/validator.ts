/**
 * Validator Module
 * Rejects requests whose input is not an existing regular file
 */

import { ConversionError, isFile } from "../utils";
import type { ConversionContext } from "../types";

export async function validate(ctx: ConversionContext): Promise<void> {
  const { inputPath } = ctx.request;

  if (!(await isFile(inputPath))) {
    throw new ConversionError(
      "input-not-found",
      `Input file not found: ${inputPath}`,
    );
  }
}
