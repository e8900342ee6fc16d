import { stat } from "fs/promises";

/**
 * Check if a path exists and is a regular file (symlinks are followed)
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}
