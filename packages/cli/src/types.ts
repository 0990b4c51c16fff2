/**
 * @ledgerlens/cli — Types for the command-line runner.
 */

import type { ChalkInstance } from "chalk";

/**
 * Where the runner reads files and writes lines. The bin wires this to
 * the process; tests pass collectors and an uncoloured chalk.
 */
export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly readFile: (path: string) => string;
  readonly chalk: ChalkInstance;
}

/**
 * - "USAGE" → bad command line (exit code 2)
 * - "INPUT" → unreadable or malformed input file (exit code 1)
 */
export type CliErrorCode = "USAGE" | "INPUT";

export class CliError extends Error {
  public readonly code: CliErrorCode;

  constructor(code: CliErrorCode, message: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
  }
}
