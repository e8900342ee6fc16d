/**
 * Process Runner
 * Spawns the external converter and collects its exit status and output
 */

import { execa } from "execa";
import type { ProcessOutcome, ProcessRunner, RunOptions } from "../types";
import { ConversionError, hasErrorCode } from "./errors";

/**
 * The slice of an execa result the runner looks at
 * With `reject: false` spawn failures resolve with the error object itself
 */
export interface SpawnResult {
  exitCode?: number;
  signal?: string;
  timedOut: boolean;
  failed: boolean;
  stdout: string;
  stderr: string;
}

export type Spawn = (
  file: string,
  args: string[],
  options: { reject: false; stripFinalNewline: false; timeout: number },
) => PromiseLike<SpawnResult>;

function spawnErrorMessage(result: SpawnResult): string {
  return result instanceof Error ? result.message : "";
}

/**
 * Create a runner on top of execa (or a stand-in with the same shape)
 *
 * Resolves once the child has exited and both streams are drained.
 * Throws a ConversionError when the executable cannot be found or the
 * timeout expires (execa kills the child in that case).
 */
export function createExecaRunner(spawn: Spawn = execa): ProcessRunner {
  return {
    async run(
      file: string,
      args: string[],
      options: RunOptions = {},
    ): Promise<ProcessOutcome> {
      const timeout = options.timeout ?? 0;
      const result = await spawn(file, args, {
        reject: false,
        stripFinalNewline: false,
        timeout,
      });

      if (hasErrorCode(result, "ENOENT")) {
        throw new ConversionError(
          "tool-not-found",
          `unoconv not found at "${file}". Please ensure it is installed and in your PATH. ${spawnErrorMessage(result)}`,
          { cause: result },
        );
      }

      if (result.timedOut) {
        throw new ConversionError(
          "timeout",
          `Conversion timed out after ${timeout}ms`,
          { stdout: result.stdout, stderr: result.stderr },
        );
      }

      const exitCode =
        typeof result.exitCode === "number" ? result.exitCode : null;

      // Spawn-time failures other than a missing binary (EACCES, ...)
      if (result.failed && exitCode === null && !result.signal) {
        throw new Error(spawnErrorMessage(result) || `Failed to start ${file}`);
      }

      return {
        exitCode,
        signal: result.signal ?? null,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    },
  };
}

export const execaRunner: ProcessRunner = createExecaRunner();
