import { existsSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { getRosterDir, initRosterDir } from "../utils/config.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize .roster/ in the current directory")
    .action(async () => {
      const jsonMode = program.opts().json === true;
      const rosterDir = getRosterDir();
      const alreadyExists = existsSync(rosterDir);

      try {
        await initRosterDir();
      } catch (err) {
        reportCommandError("init", err, jsonMode);
        return;
      }

      if (jsonMode) {
        outputJson({
          success: true,
          command: "init",
          created: !alreadyExists,
          path: rosterDir,
        });
      } else if (alreadyExists) {
        console.log(
          chalk.green("Updated .roster/ — filled in any missing files."),
        );
      } else {
        console.log(chalk.green(`Initialized .roster/ in ${process.cwd()}`));
      }
    });
}
