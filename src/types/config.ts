/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMEOUT = 2_147_483_647;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  timestamps: z.boolean(),
});

export const ConverterConfigSchema = z.object({
  // Executable name (looked up on PATH) or a relative/absolute path
  unoconvPath: z.string().min(1),
  // In milliseconds, 0 disables the timeout
  timeout: z.number().int().nonnegative().max(MAX_TIMEOUT),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConverterConfigSchema = ConverterConfigSchema.partial().extend({
  logging: LoggingConfigSchema.partial().optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type PartialConverterConfig = z.infer<typeof PartialConverterConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
