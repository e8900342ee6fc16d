import path from "node:path";
import { lookup } from "mime-types";

/**
 * Infer a MIME type from a filename's extension
 *
 * Only the extension is looked up, so a bare name such as "pdf" has none.
 *
 * @example
 * inferTargetFormat("report.pdf"); // "application/pdf"
 * inferTargetFormat("notes.unknownext"); // null
 * inferTargetFormat("pdf"); // null
 */
export function inferTargetFormat(outputPath: string): string | null {
  const extension = path.extname(outputPath);
  if (!extension) return null;

  const mime = lookup(extension);
  return mime === false ? null : mime;
}
