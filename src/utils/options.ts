import { basename, join, resolve } from "node:path";
import { InvalidArgumentError } from "commander";

export function parseAgeOption(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Age must be a whole number.");
  }
  return parseInt(trimmed, 10);
}

/**
 * Bare file names live inside `.roster/`; anything with a directory part
 * is taken relative to the working directory.
 */
export function resolveBackupArg(
  rosterDir: string,
  file: string,
  cwd: string = process.cwd(),
): string {
  return basename(file) === file ? join(rosterDir, file) : resolve(cwd, file);
}
