import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import { getStudentSummary } from "../utils/format.js";
import { outputJson, reportCommandError } from "../utils/json-output.js";
import { parseAgeOption } from "../utils/options.js";

interface AddOptions {
  name: string;
  age: number;
  grade: string;
  email: string;
  phone: string;
}

export function registerAddCommand(program: Command): void {
  program
    .command("add")
    .description("Add a student record")
    .requiredOption("--name <name>", "student name")
    .requiredOption("--age <age>", "student age", parseAgeOption)
    .requiredOption("--grade <grade>", "grade letter, e.g. A")
    .option("--email <email>", "email address", "")
    .option("--phone <phone>", "phone number", "")
    .action(async (options: AddOptions) => {
      const jsonMode = program.opts().json === true;
      try {
        const roster = await openRoster();
        const { position, record } = await roster.students.addStudent({
          name: options.name,
          age: options.age,
          grade: options.grade,
          email: options.email,
          phone: options.phone,
        });

        if (jsonMode) {
          outputJson({
            success: true,
            command: "add",
            position,
            id: record.id ?? null,
            record,
          });
        } else {
          console.log(
            chalk.green(
              `✔ Added #${position} (${record.id ?? "no id"}): ${getStudentSummary(record)}`,
            ),
          );
        }
      } catch (err) {
        reportCommandError("add", err, jsonMode);
      }
    });
}
