import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { mergeStudentFields } from "../services/students.js";
import type { StudentFields } from "../schemas/student.js";
import { getStudentSummary } from "../utils/format.js";
import { outputJson, outputJsonError, reportCommandError } from "../utils/json-output.js";
import { parseAgeOption } from "../utils/options.js";

export function registerUpdateCommand(program: Command): void {
  program
    .command("update")
    .argument("<identifier>", "student ID (STU001) or 1-based position")
    .description("Update a student; fields not given keep their value")
    .option("--name <name>", "new name")
    .option("--age <age>", "new age", parseAgeOption)
    .option("--grade <grade>", "new grade")
    .option("--email <email>", "new email address")
    .option("--phone <phone>", "new phone number")
    .action(async (identifier: string, options: Partial<StudentFields>) => {
      const jsonMode = program.opts().json === true;
      const changed = (["name", "age", "grade", "email", "phone"] as const).filter(
        (field) => options[field] !== undefined,
      );
      if (changed.length === 0) {
        const message = "No fields to update. Pass at least one of --name, --age, --grade, --email, --phone.";
        if (jsonMode) {
          outputJsonError("update", message);
        } else {
          console.error(chalk.red(`Error: ${message}`));
        }
        process.exitCode = 1;
        return;
      }

      try {
        const roster = await openRoster();
        const target = roster.students.resolveStudent(identifier);
        const { position, record } = await roster.students.updateStudent(
          target.position,
          mergeStudentFields(target.record, options),
        );

        if (jsonMode) {
          outputJson({
            success: true,
            command: "update",
            position,
            id: record.id ?? null,
            updated_fields: changed,
            record,
          });
        } else {
          console.log(
            chalk.green(
              `✔ Updated #${position}${record.id ? ` (${record.id})` : ""}: ${getStudentSummary(record)}`,
            ),
          );
        }
      } catch (err) {
        reportCommandError("update", err, jsonMode);
      }
    });
}
