/**
 * Conversion Errors
 * Typed failure reasons for every stage of the pipeline
 */

export type ConversionErrorReason =
  | "input-not-found"
  | "unresolved-target-format"
  | "tool-not-found"
  | "conversion-failed"
  | "timeout"
  | "unknown";

interface ConversionErrorDetails {
  cause?: unknown;
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
}

export class ConversionError extends Error {
  readonly reason: ConversionErrorReason;
  readonly exitCode?: number | null;
  readonly stdout?: string;
  readonly stderr?: string;

  constructor(
    reason: ConversionErrorReason,
    message: string,
    details: ConversionErrorDetails = {},
  ) {
    super(message, { cause: details.cause });
    this.name = "ConversionError";
    this.reason = reason;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

/**
 * Normalize anything thrown inside the pipeline into a ConversionError
 * Values that are not already ConversionErrors become reason "unknown"
 */
export function toConversionError(error: unknown): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConversionError(
    "unknown",
    `An unexpected error occurred: ${message}`,
    { cause: error },
  );
}

/**
 * Check for a Node system error code such as ENOENT
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}
