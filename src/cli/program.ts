/**
 * Commander program definition
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

export interface ProgramActions {
  convert?: typeof convertCommand;
  config?: typeof configCommand;
}

export function createProgram(actions: ProgramActions = {}): Command {
  const program = new Command();

  program
    .name("unoconv-convert")
    .description(
      'Converts files between different MIME types.\n' +
        'An input file named "config" must be written as ./config, ' +
        "since bare config runs the config command.",
    )
    .version("0.1.0");

  // Main conversion command (default action)
  program
    .argument("<input_file>", "The input file to convert.")
    .argument("<output_file>", "The output file to save the conversion to.")
    .option(
      "--target_mime <type>",
      "The target MIME type for the conversion. If not specified, tries to infer from output file extension.",
    )
    .option("--unoconv_path <path>", "Path to the unoconv executable. Defaults to 'unoconv'.")
    .option("--timeout <ms>", "Kill unoconv after this many milliseconds (0 waits forever)")
    .option("-c, --config <path>", "Path to custom config file")
    .option("--debug", "Enable debug logging.")
    .action(actions.convert ?? convertCommand);

  // Config command - show config location and effective settings
  program
    .command("config")
    .description("Show configuration file location and effective settings")
    .action(actions.config ?? configCommand);

  return program;
}
