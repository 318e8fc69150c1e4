import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { listBackups } from "../utils/persistence.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";
import { resolveBackupArg } from "../utils/options.js";

export function registerRestoreCommand(program: Command): void {
  program
    .command("restore")
    .argument("[file]", "backup file (bare names are looked up inside .roster/)")
    .description("Replace the data file with a backup")
    .option("--list", "list available backups instead of restoring")
    .action(async (file: string | undefined, options: { list?: boolean }) => {
      const jsonMode = program.opts().json === true;
      try {
        // Restore replaces the data file, so it is not parsed first.
        const roster = await openRoster(process.cwd(), { load: false });

        if (options.list) {
          const backups = await listBackups(
            roster.dir,
            roster.config.data_file,
            roster.config.backup_file,
          );
          if (jsonMode) {
            outputJson({ success: true, command: "restore", backups });
          } else if (backups.length === 0) {
            console.log(chalk.yellow("No backup files found."));
          } else {
            console.log(chalk.bold("Available backups:"));
            backups.forEach((name, i) => console.log(`${i + 1}. ${name}`));
          }
          return;
        }

        const backupPath = file
          ? resolveBackupArg(roster.dir, file)
          : roster.students.backupPath;
        const count = await roster.students.restore(backupPath);

        if (jsonMode) {
          outputJson({ success: true, command: "restore", path: backupPath, records: count });
        } else {
          console.log(chalk.green(`✔ Restored ${count} record(s) from ${backupPath}`));
        }
      } catch (err) {
        reportCommandError("restore", err, jsonMode);
      }
    });
}
