import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { formatStatistics } from "../utils/format.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";

export function registerStatsCommand(program: Command): void {
  program
    .command("stats")
    .description("Show student count, average age and grade distribution")
    .action(async () => {
      const jsonMode = program.opts().json === true;
      try {
        const roster = await openRoster();
        const summary = roster.analytics.summary();

        if (jsonMode) {
          outputJson({ success: true, command: "stats", ...summary });
        } else {
          console.log(chalk.bold("Statistics"));
          console.log(formatStatistics(summary));
        }
      } catch (err) {
        reportCommandError("stats", err, jsonMode);
      }
    });
}
