import { join } from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { timestampedBackupName } from "../utils/persistence.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";
import { resolveBackupArg } from "../utils/options.js";

export function registerBackupCommand(program: Command): void {
  program
    .command("backup")
    .argument("[file]", "backup file (bare names are kept inside .roster/)")
    .description("Copy the data file to a backup")
    .option("--timestamp", "name the backup after the current date and time")
    .action(async (file: string | undefined, options: { timestamp?: boolean }) => {
      const jsonMode = program.opts().json === true;
      try {
        const roster = await openRoster();
        let target: string | undefined;
        if (file) {
          target = resolveBackupArg(roster.dir, file);
        } else if (options.timestamp) {
          target = join(roster.dir, timestampedBackupName(roster.config.data_file, new Date()));
        }

        const backupPath = await roster.students.backup(target);

        if (jsonMode) {
          outputJson({
            success: true,
            command: "backup",
            path: backupPath,
            records: roster.students.store.size,
          });
        } else {
          console.log(
            chalk.green(`✔ Backed up ${roster.students.store.size} record(s) to ${backupPath}`),
          );
        }
      } catch (err) {
        reportCommandError("backup", err, jsonMode);
      }
    });
}
