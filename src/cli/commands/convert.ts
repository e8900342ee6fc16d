/**
 * Convert command - Loads config and runs one conversion
 */

import chalk from "chalk";
import ora from "ora";
import { convert } from "../../converter";
import {
  Logger,
  describeConfigError,
  formatStatus,
  getUserConfigPath,
  loadConfig,
} from "../../utils";
import type { ProcessRunner } from "../../types";
import {
  applyCliOverrides,
  parseConvertOptions,
  type ConvertCliOptions,
} from "../options";

export interface ConvertCommandDeps {
  runner?: ProcessRunner;
  userConfigPath?: string;
}

/**
 * Run one conversion and print its status line
 * Failure (including bad options) leaves process.exitCode at 1
 */
export async function runConvert(
  inputFile: string,
  outputFile: string,
  opts: ConvertCliOptions,
  deps: ConvertCommandDeps = {},
): Promise<void> {
  const spinner = ora({ text: `Converting ${inputFile}...`, indent: 2 });

  try {
    // Validate CLI options
    const options = parseConvertOptions(opts);

    // Load configuration (default → user → custom), then CLI overrides
    const loaded = await loadConfig(
      options.config,
      deps.userConfigPath ?? getUserConfigPath(),
    );
    const config = applyCliOverrides(loaded.config, options);

    // Log lines are written around the spinner so they do not garble it
    const logger = new Logger({
      level: config.logging.level,
      timestamps: config.logging.timestamps,
      sink: (line) => {
        if (spinner.isSpinning) spinner.clear();
        console.error(line);
        if (spinner.isSpinning) spinner.render();
      },
    });

    logger.debug("Debug mode enabled.");
    for (const err of loaded.errors) {
      logger.warn(describeConfigError(err));
    }

    spinner.start();
    const result = await convert(
      {
        inputPath: inputFile,
        outputPath: outputFile,
        targetFormat: options.target_mime,
        toolPath: config.unoconvPath,
      },
      { logger, runner: deps.runner, timeout: config.timeout },
    );
    spinner.stop();

    const status = formatStatus(result, outputFile);
    if (result.ok) {
      console.log(chalk.green(status));
    } else {
      console.log(chalk.red(status));
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exitCode = 1;
  }
}

export async function convertCommand(
  inputFile: string,
  outputFile: string,
  opts: ConvertCliOptions,
): Promise<void> {
  await runConvert(inputFile, outputFile, opts);
}
