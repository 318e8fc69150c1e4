import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { getStudentSummary } from "../utils/format.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";

export function registerDeleteCommand(program: Command): void {
  program
    .command("delete")
    .argument("<identifier>", "student ID (STU001) or 1-based position")
    .description("Delete a student record")
    .action(async (identifier: string) => {
      const jsonMode = program.opts().json === true;
      try {
        const roster = await openRoster();
        const target = roster.students.resolveStudent(identifier);
        const { position, record } = await roster.students.deleteStudent(target.position);

        if (jsonMode) {
          outputJson({
            success: true,
            command: "delete",
            position,
            id: record.id ?? null,
            summary: getStudentSummary(record),
          });
        } else {
          const idLabel = record.id ? ` (${record.id})` : "";
          console.log(
            chalk.green(`✔ Deleted #${position}${idLabel}: ${getStudentSummary(record)}`),
          );
        }
      } catch (err) {
        reportCommandError("delete", err, jsonMode);
      }
    });
}
