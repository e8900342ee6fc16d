import path from "node:path";

/**
 * Output format token handed to unoconv's `-f` option
 * The file's last extension without its leading dot ("" when there is none)
 */
export function formatFlag(outputPath: string): string {
  return path.extname(outputPath).replace(/^\.+/, "");
}
