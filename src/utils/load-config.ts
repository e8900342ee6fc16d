import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ZodError } from "zod";
import type {
  ConfigError,
  ConverterConfig,
  PartialConverterConfig,
} from "../types";
import {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("unoconv-convert", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConverterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConverterConfigSchema.parse(parsed);
}

/**
 * Load a partial config layer from disk
 * Throws if the file is unreadable, not JSON, or fails validation
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConverterConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConverterConfigSchema.parse(parsed);
}

function mergeConfig(
  base: ConverterConfig,
  override: PartialConverterConfig,
): ConverterConfig {
  return {
    unoconvPath: override.unoconvPath ?? base.unoconvPath,
    timeout: override.timeout ?? base.timeout,
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConverterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Layers that fail to load are skipped and reported in `errors`
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/unoconv-convert or ~/.config/unoconv-convert
 * - macOS: ~/Library/Preferences/unoconv-convert
 * - Windows: %APPDATA%\unoconv-convert
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}

/**
 * One-line description of a config layer that failed to load
 */
export function describeConfigError({ path, error }: ConfigError): string {
  let details: string;
  if (error instanceof ZodError) {
    details = error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
  } else if (error instanceof Error) {
    details = error.message;
  } else {
    details = String(error);
  }
  return `Ignoring config ${path}: ${details}`;
}
