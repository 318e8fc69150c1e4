import chalk from "chalk";
import { errorMessage, isErrnoException } from "./errors.js";

export interface JsonResult {
  success: boolean;
  command: string;
  [key: string]: unknown;
}

export const NOT_INITIALIZED_MESSAGE =
  "No .roster/ directory found. Run `roster init` first.";

export function outputJson(result: JsonResult): void {
  console.log(JSON.stringify(result, null, 2));
}

export function outputJsonError(command: string, error: string): void {
  console.error(JSON.stringify({ success: false, command, error }, null, 2));
}

/**
 * Report a failed command on stderr and mark the process as failed.
 * A missing config file means the project was never initialized.
 */
export function reportCommandError(
  command: string,
  err: unknown,
  jsonMode: boolean,
): void {
  const message =
    isErrnoException(err) && err.code === "ENOENT"
      ? NOT_INITIALIZED_MESSAGE
      : errorMessage(err);
  if (jsonMode) {
    outputJsonError(command, message);
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }
  process.exitCode = 1;
}
