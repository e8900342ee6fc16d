import type { ConversionResult } from "../types";

/**
 * Final human-readable status line printed by the CLI
 * Names the output file as the user typed it, not its resolved form
 */
export function formatStatus(
  result: ConversionResult,
  outputFile: string,
): string {
  return result.ok
    ? `File successfully converted to ${outputFile}`
    : "File conversion failed.";
}
