import { createInterface } from "node:readline";
import { Command } from "commander";
import chalk from "chalk";
import { openRoster } from "../services/roster.js";
import type { Roster } from "../services/roster.js";
import { mergeStudentFields } from "../services/students.js";
import type { NumberedStudent } from "../schemas/student.js";
import {
  formatStatistics,
  formatStudent,
  formatStudentList,
  getStudentSummary,
} from "../utils/format.js";
import { listBackups } from "../utils/persistence.js";
import { CorruptDataError, errorMessage } from "../utils/errors.js";
import { reportCommandError } from "../utils/json-output.js";
import { resolveBackupArg } from "../utils/options.js";

/** Line-based terminal I/O; `ask` resolves to null once input has ended. */
export interface MenuIO {
  ask(prompt: string): Promise<string | null>;
  print(text: string): void;
}

export const MENU_ACTIONS = [
  "Add New Student",
  "View All Students",
  "Search Students",
  "Update Student",
  "Delete Student",
  "View Statistics",
  "Backup Records",
  "Restore Records",
  "Exit",
] as const;

const RULE = "=".repeat(60);

export function formatMenu(): string {
  const lines = [RULE, "STUDENT ROSTER".padStart(37), RULE];
  MENU_ACTIONS.forEach((label, i) => lines.push(`${i + 1}. ${label}`));
  lines.push(RULE);
  return lines.join("\n");
}

class InputClosed extends Error {
  constructor() {
    super("Input closed");
  }
}

/**
 * Prompts on top of MenuIO. End of input inside an action raises
 * InputClosed so the loop can finish the session.
 */
class Prompter {
  constructor(private readonly io: MenuIO) {}

  async text(prompt: string): Promise<string> {
    const answer = await this.io.ask(prompt);
    if (answer === null) {
      throw new InputClosed();
    }
    return answer.trim();
  }

  async required(prompt: string): Promise<string> {
    for (;;) {
      const answer = await this.text(prompt);
      if (answer) return answer;
      this.io.print(chalk.red("A value is required."));
    }
  }

  /** Whole number; blank returns `fallback` when one is given. */
  async integer(prompt: string, fallback?: number): Promise<number> {
    for (;;) {
      const answer = await this.text(prompt);
      if (!answer && fallback !== undefined) return fallback;
      if (/^-?\d+$/.test(answer)) return parseInt(answer, 10);
      this.io.print(chalk.red("Please enter a whole number."));
    }
  }
}

/** One menu run. `loadError` is set while the data file could not be read. */
interface MenuSession {
  roster: Roster;
  prompt: Prompter;
  io: MenuIO;
  loadError?: CorruptDataError;
}

type MenuHandler = (session: MenuSession) => Promise<void>;

const RESTORE_CHOICE = "8";

async function pickStudent({ roster, prompt, io }: MenuSession, verb: string): Promise<NumberedStudent> {
  const identifier = await prompt.required(`Enter student ID or position to ${verb}: `);
  const target = roster.students.resolveStudent(identifier);
  io.print(formatStudent(target));
  return target;
}

const handlers: Record<string, MenuHandler> = {
  "1": async ({ roster, prompt, io }) => {
    io.print("\n--- ADD NEW STUDENT ---");
    const name = await prompt.required("Name: ");
    const age = await prompt.integer("Age: ");
    const grade = await prompt.required("Grade: ");
    const email = await prompt.text("Email (optional): ");
    const phone = await prompt.text("Phone (optional): ");
    const { position, record } = await roster.students.addStudent({ name, age, grade, email, phone });
    io.print(chalk.green(`✔ Added #${position} (${record.id ?? "no id"}): ${getStudentSummary(record)}`));
  },

  "2": async ({ roster, io }) => {
    io.print(formatStudentList(roster.students.listStudents()));
  },

  "3": async ({ roster, prompt, io }) => {
    io.print("\n--- SEARCH STUDENTS ---\nLeave a field blank to skip it.");
    const name = await prompt.text("Name: ");
    const age = await prompt.text("Age: ");
    const grade = await prompt.text("Grade: ");
    const matches = roster.students.matchStudents({ name, age, grade });
    io.print(
      matches.length === 0
        ? "No students found matching the criteria."
        : formatStudentList(matches, "Matches"),
    );
  },

  "4": async (session) => {
    const { roster, prompt, io } = session;
    io.print("\n--- UPDATE STUDENT ---");
    const { position, record } = await pickStudent(session, "update");
    io.print("Enter new values (leave blank to keep current):");
    const name = await prompt.text(`Name [${record.name}]: `);
    const age = await prompt.integer(`Age [${record.age}]: `, record.age);
    const grade = await prompt.text(`Grade [${record.grade}]: `);
    const email = await prompt.text(`Email [${record.email}]: `);
    const phone = await prompt.text(`Phone [${record.phone}]: `);
    const updated = await roster.students.updateStudent(
      position,
      mergeStudentFields(record, {
        name: name || undefined,
        age,
        grade: grade || undefined,
        email: email || undefined,
        phone: phone || undefined,
      }),
    );
    io.print(chalk.green(`✔ Updated #${updated.position}: ${getStudentSummary(updated.record)}`));
  },

  "5": async (session) => {
    const { roster, prompt, io } = session;
    io.print("\n--- DELETE STUDENT ---");
    const { position, record } = await pickStudent(session, "delete");
    const confirm = await prompt.text(`Delete ${record.name}? (yes/no): `);
    if (confirm.toLowerCase() !== "yes") {
      io.print(chalk.yellow("Deletion cancelled."));
      return;
    }
    await roster.students.deleteStudent(position);
    io.print(chalk.green(`✔ Deleted #${position}: ${getStudentSummary(record)}`));
  },

  "6": async ({ roster, io }) => {
    io.print(formatStatistics(roster.analytics.summary()));
  },

  "7": async ({ roster, io }) => {
    const backupPath = await roster.students.backup();
    io.print(chalk.green(`✔ Backed up ${roster.students.store.size} record(s) to ${backupPath}`));
  },

  [RESTORE_CHOICE]: async (session) => {
    const { roster, prompt, io } = session;
    const backups = await listBackups(roster.dir, roster.config.data_file, roster.config.backup_file);
    if (backups.length === 0) {
      io.print(chalk.yellow("No backup files found."));
      return;
    }
    io.print("Available backups:");
    backups.forEach((name, i) => io.print(`${i + 1}. ${name}`));
    const choice = await prompt.integer("Select backup to restore (number): ");
    if (choice < 1 || choice > backups.length) {
      io.print(chalk.red("Invalid selection."));
      return;
    }
    const backupPath = resolveBackupArg(roster.dir, backups[choice - 1]);
    const count = await roster.students.restore(backupPath);
    session.loadError = undefined;
    io.print(chalk.green(`✔ Restored ${count} record(s) from ${backups[choice - 1]}`));
  },
};

/**
 * Open the roster for the menu. A corrupt data file does not stop the
 * menu; it starts over an empty store with the error kept for display.
 */
export async function openMenuSession(
  cwd: string = process.cwd(),
): Promise<{ roster: Roster; loadError?: CorruptDataError }> {
  try {
    return { roster: await openRoster(cwd) };
  } catch (err) {
    if (!(err instanceof CorruptDataError)) {
      throw err;
    }
    return { roster: await openRoster(cwd, { load: false }), loadError: err };
  }
}

function corruptNotice(loadError: CorruptDataError): string {
  return chalk.red(`Error: ${loadError.message}`) +
    `\nOnly ${RESTORE_CHOICE} (${MENU_ACTIONS[7]}) and ${MENU_ACTIONS.length} (${MENU_ACTIONS[8]}) are available until a backup is restored.`;
}

/**
 * Run the menu until Exit or end of input. Errors are reported and the
 * menu is shown again; Exit saves before returning. While `loadError` is
 * set only Restore and Exit run, and nothing is saved over the data file.
 */
export async function runMenu(
  roster: Roster,
  io: MenuIO,
  loadError?: CorruptDataError,
): Promise<void> {
  const session: MenuSession = { roster, prompt: new Prompter(io), io, loadError };
  if (session.loadError) {
    io.print(corruptNotice(session.loadError));
  }

  const finish = async (): Promise<void> => {
    if (!session.loadError) {
      await roster.students.save();
    }
  };

  for (;;) {
    io.print(formatMenu());
    const choice = await io.ask(`Enter your choice (1-${MENU_ACTIONS.length}): `);

    if (choice === null || choice.trim() === String(MENU_ACTIONS.length)) {
      try {
        await finish();
        io.print("Goodbye!");
        return;
      } catch (err) {
        io.print(chalk.red(`Error: ${errorMessage(err)}`));
        if (choice === null) return;
        continue;
      }
    }

    const handler = handlers[choice.trim()];
    if (!handler) {
      io.print(chalk.red(`Invalid choice. Enter a number between 1 and ${MENU_ACTIONS.length}.`));
      continue;
    }
    if (session.loadError && choice.trim() !== RESTORE_CHOICE) {
      io.print(corruptNotice(session.loadError));
      continue;
    }

    try {
      await handler(session);
    } catch (err) {
      if (err instanceof InputClosed) {
        await finish();
        return;
      }
      io.print(chalk.red(`Error: ${errorMessage(err)}`));
    }
  }
}

export function registerMenuCommand(program: Command): void {
  program
    .command("menu")
    .description("Interactive menu with every roster action")
    .action(async () => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const lines = rl[Symbol.asyncIterator]();
      const io: MenuIO = {
        async ask(prompt) {
          process.stdout.write(prompt);
          const next = await lines.next();
          return next.done ? null : next.value;
        },
        print: (text) => console.log(text),
      };

      try {
        const { roster, loadError } = await openMenuSession();
        await runMenu(roster, io, loadError);
      } catch (err) {
        reportCommandError("menu", err, false);
      } finally {
        rl.close();
      }
    });
}
