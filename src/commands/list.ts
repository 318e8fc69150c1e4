import { Command, Option } from "commander";
import { openRoster } from "../services/roster.js";
import { formatStudentList, sortStudents } from "../utils/format.js";
import type { SortKey } from "../utils/format.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List every student with its position and ID")
    .addOption(
      new Option("--sort <key>", "display order")
        .choices(["position", "name", "age", "grade"])
        .default("position"),
    )
    .action(async (options: { sort: SortKey }) => {
      const jsonMode = program.opts().json === true;
      try {
        const roster = await openRoster();
        const students = sortStudents(roster.students.listStudents(), options.sort);

        if (jsonMode) {
          outputJson({
            success: true,
            command: "list",
            total: students.length,
            students,
          });
        } else {
          console.log(formatStudentList(students));
        }
      } catch (err) {
        reportCommandError("list", err, jsonMode);
      }
    });
}
