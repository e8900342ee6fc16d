/**
 * CLI option validation and config overrides
 */

import { z } from "zod";
import { MAX_TIMEOUT } from "../types";
import type { ConverterConfig } from "../types";

export const ConvertOptionsSchema = z.object({
  target_mime: z.string().optional(),
  unoconv_path: z.string().min(1).optional(),
  timeout: z
    .string()
    .regex(/^\d+$/, "timeout must be a whole number of milliseconds")
    .transform(Number)
    .pipe(z.number().max(MAX_TIMEOUT, `timeout must be at most ${MAX_TIMEOUT}ms`))
    .optional(),
  config: z.string().optional(),
  debug: z.boolean().optional(),
});

export type ConvertCliOptions = z.input<typeof ConvertOptionsSchema>;
export type ConvertOptions = z.output<typeof ConvertOptionsSchema>;

/**
 * Validate raw commander options, throws ZodError on bad input
 */
export function parseConvertOptions(opts: ConvertCliOptions): ConvertOptions {
  return ConvertOptionsSchema.parse(opts);
}

/**
 * Apply command-line flags on top of the merged config file layers
 */
export function applyCliOverrides(
  config: ConverterConfig,
  options: ConvertOptions,
): ConverterConfig {
  return {
    unoconvPath: options.unoconv_path ?? config.unoconvPath,
    timeout: options.timeout ?? config.timeout,
    logging: {
      ...config.logging,
      level: options.debug ? "debug" : config.logging.level,
    },
  };
}
