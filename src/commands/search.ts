import { Command } from "commander";
import { openRoster } from "../services/roster.js";
import type { SearchCriteria } from "../schemas/student.js";
import { formatStudentList } from "../utils/format.js";
import { outputJson, outputJsonError, reportCommandError } from "../utils/json-output.js";
import { parseAgeOption } from "../utils/options.js";

export function describeCriteria(criteria: SearchCriteria): string {
  const parts: string[] = [];
  if (criteria.name) parts.push(`name contains "${criteria.name}"`);
  if (criteria.age !== undefined) parts.push(`age ${criteria.age}`);
  if (criteria.grade) parts.push(`grade ${criteria.grade}`);
  return parts.join(", ");
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .description("Search students; every given filter must match")
    .option("--name <name>", "name contains (case-insensitive unless configured)")
    .option("--age <age>", "exact age", parseAgeOption)
    .option("--grade <grade>", "exact grade")
    .action(async (options: SearchCriteria) => {
      const jsonMode = program.opts().json === true;
      if (!options.name && options.age === undefined && !options.grade) {
        const message = "Provide at least one of --name, --age, or --grade.";
        if (jsonMode) {
          outputJsonError("search", message);
        } else {
          console.error(`Error: ${message}`);
        }
        process.exitCode = 1;
        return;
      }

      try {
        const roster = await openRoster();
        const matches = roster.students.matchStudents(options);

        if (jsonMode) {
          outputJson({
            success: true,
            command: "search",
            criteria: options,
            total: matches.length,
            matches,
          });
        } else if (matches.length === 0) {
          console.log(`No students matching ${describeCriteria(options)} found.`);
        } else {
          console.log(formatStudentList(matches, "Matches"));
        }
      } catch (err) {
        reportCommandError("search", err, jsonMode);
      }
    });
}
