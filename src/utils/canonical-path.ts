/**
 * Path Canonicalization
 * Absolute, symlink-free paths for files that may not exist yet
 */

import { realpath } from "fs/promises";
import path from "node:path";
import { hasErrorCode } from "./errors";

/**
 * Resolve a path against the working directory and follow symlinks
 *
 * Missing trailing segments are kept as-is on top of the nearest existing
 * ancestor, so output paths that are about to be created still resolve.
 *
 * @example
 * // with /tmp -> /private/tmp
 * await canonicalPath("/tmp/out/report.pdf"); // "/private/tmp/out/report.pdf"
 */
export async function canonicalPath(target: string): Promise<string> {
  const absolute = path.resolve(target);

  try {
    return await realpath(absolute);
  } catch (error) {
    if (!hasErrorCode(error, "ENOENT") && !hasErrorCode(error, "ENOTDIR")) {
      throw error;
    }
  }

  const parent = path.dirname(absolute);
  if (parent === absolute) {
    return absolute;
  }
  return path.join(await canonicalPath(parent), path.basename(absolute));
}
