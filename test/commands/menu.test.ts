import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import chalk from "chalk";
import { MENU_ACTIONS, formatMenu, openMenuSession, runMenu } from "../../src/commands/menu.js";
import type { MenuIO } from "../../src/commands/menu.js";
import { openRoster } from "../../src/services/roster.js";
import type { Roster } from "../../src/services/roster.js";
import { initRosterDir } from "../../src/utils/config.js";
import { loadStudents } from "../../src/utils/persistence.js";

/** Feeds scripted answers and records everything printed. */
function scriptedIO(answers: string[]): MenuIO & { output: string[]; prompts: string[] } {
  const queue = [...answers];
  const output: string[] = [];
  const prompts: string[] = [];
  return {
    output,
    prompts,
    async ask(prompt) {
      prompts.push(prompt);
      return queue.shift() ?? null;
    },
    print(text) {
      output.push(text);
    },
  };
}

describe("menu", () => {
  let tmpDir: string;
  let roster: Roster;
  let level: typeof chalk.level;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "roster-menu-test-"));
    await initRosterDir(tmpDir);
    roster = await openRoster(tmpDir);
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(async () => {
    chalk.level = level;
    await rm(tmpDir, { recursive: true, force: true });
  });

  const dataPath = (): string => join(tmpDir, ".roster", "students.json");

  it("lists the nine actions", () => {
    expect(MENU_ACTIONS).toHaveLength(9);
    const lines = formatMenu().split("\n");
    expect(lines[3]).toBe("1. Add New Student");
    expect(lines[11]).toBe("9. Exit");
  });

  it("adds a student and saves on exit", async () => {
    const io = scriptedIO(["1", "Nand Patel", "20", "A", "nandpatel@example.com", "9876543210", "9"]);
    await runMenu(roster, io);

    expect(io.output).toContain("✔ Added #1 (STU001): Nand Patel (age 20, grade A)");
    expect(io.output.at(-1)).toBe("Goodbye!");
    const saved = await loadStudents(dataPath());
    expect(saved.map((r) => [r.name, r.age, r.email])).toEqual([
      ["Nand Patel", 20, "nandpatel@example.com"],
    ]);
  });

  it("asks again for a non-numeric age", async () => {
    const io = scriptedIO(["1", "Asha Rao", "twenty", "19", "B", "", "", "9"]);
    await runMenu(roster, io);

    expect(io.output).toContain("Please enter a whole number.");
    expect(roster.students.getStudent(1).record).toMatchObject({
      name: "Asha Rao",
      age: 19,
      grade: "B",
      email: "",
      phone: "",
    });
  });

  it("reports an invalid choice and shows the menu again", async () => {
    const io = scriptedIO(["42", "9"]);
    await runMenu(roster, io);
    expect(io.output).toContain("Invalid choice. Enter a number between 1 and 9.");
    expect(io.output.filter((line) => line === formatMenu())).toHaveLength(2);
  });

  it("reports a missing student and returns to the menu", async () => {
    const io = scriptedIO(["5", "7", "9"]);
    await runMenu(roster, io);
    expect(io.output).toContain("Error: No student at position 7. The roster has 0 record(s).");
    expect(io.output.at(-1)).toBe("Goodbye!");
  });

  it("deletes only after confirmation", async () => {
    await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });

    const cancelled = scriptedIO(["5", "1", "no", "9"]);
    await runMenu(roster, cancelled);
    expect(cancelled.output).toContain("Deletion cancelled.");
    expect(roster.students.store.size).toBe(1);

    const confirmed = scriptedIO(["5", "STU001", "yes", "9"]);
    await runMenu(roster, confirmed);
    expect(confirmed.output).toContain("✔ Deleted #1: Nand Patel (age 20, grade A)");
    expect(await loadStudents(dataPath())).toEqual([]);
  });

  it("updates only the fields that were filled in", async () => {
    await roster.students.addStudent({
      name: "Nand Patel",
      age: 20,
      grade: "A",
      email: "nandpatel@example.com",
      phone: "9876543210",
    });
    const io = scriptedIO(["4", "1", "", "", "B", "", "5550100", "9"]);
    await runMenu(roster, io);

    expect(io.prompts).toContain("Age [20]: ");
    expect(roster.students.getStudent(1).record).toMatchObject({
      name: "Nand Patel",
      age: 20,
      grade: "B",
      email: "nandpatel@example.com",
      phone: "5550100",
    });
  });

  it("searches with blank fields skipped", async () => {
    await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });
    await roster.students.addStudent({ name: "Priya Shah", age: 22, grade: "B", email: "", phone: "" });

    const io = scriptedIO(["3", "", "", "b", "3", "Zed", "", "", "9"]);
    await runMenu(roster, io);

    expect(io.output).toContain(
      "## Matches (1 record)\n\n#2 [STU002] Priya Shah\n  Age: 22\n  Grade: B\n  Updated: " +
        roster.students.getStudent(2).record.updated_at,
    );
    expect(io.output).toContain("No students found matching the criteria.");
  });

  it("shows statistics", async () => {
    await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });
    await roster.students.addStudent({ name: "Priya Shah", age: 24, grade: "A", email: "", phone: "" });
    const io = scriptedIO(["6", "9"]);
    await runMenu(roster, io);
    expect(io.output).toContain(
      "Total Students: 2\nAverage Age: 22\n\nGrade Distribution:\n" +
        "  A: 2 student(s)\n  B: 0 student(s)\n  C: 0 student(s)\n  D: 0 student(s)",
    );
  });

  it("backs up and restores through the menu", async () => {
    await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });
    const io = scriptedIO([
      "7",
      "1", "Priya Shah", "22", "B", "", "",
      "8", "1",
      "9",
    ]);
    await runMenu(roster, io);

    expect(io.output).toContain("1. students.json.bak");
    expect(io.output).toContain("✔ Restored 1 record(s) from students.json.bak");
    expect(roster.students.listStudents().map((s) => s.record.name)).toEqual(["Nand Patel"]);
  });

  it("says so when there is nothing to restore", async () => {
    const io = scriptedIO(["8", "9"]);
    await runMenu(roster, io);
    expect(io.output).toContain("No backup files found.");
  });

  describe("with a corrupt data file", () => {
    const notice =
      "Only 8 (Restore Records) and 9 (Exit) are available until a backup is restored.";

    beforeEach(async () => {
      await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });
      await roster.students.backup();
      await writeFile(dataPath(), "{oops", "utf-8");
    });

    it("starts, offers restore and saves once restored", async () => {
      const { roster: damaged, loadError } = await openMenuSession(tmpDir);
      expect(loadError?.code).toBe("CORRUPT_DATA");

      const io = scriptedIO(["2", "8", "1", "2", "9"]);
      await runMenu(damaged, io, loadError);

      expect(io.output[0]).toBe(`Error: ${loadError?.message}\n${notice}`);
      expect(io.output.filter((line) => line.endsWith(notice))).toHaveLength(2);
      expect(io.output).toContain("✔ Restored 1 record(s) from students.json.bak");
      expect(damaged.students.listStudents().map((s) => s.record.name)).toEqual(["Nand Patel"]);
      expect(io.output.at(-1)).toBe("Goodbye!");
      expect((await loadStudents(dataPath())).map((r) => r.name)).toEqual(["Nand Patel"]);
    });

    it("leaves the data file alone on exit without a restore", async () => {
      const { roster: damaged, loadError } = await openMenuSession(tmpDir);
      const io = scriptedIO(["1", "9"]);
      await runMenu(damaged, io, loadError);

      expect(io.output.at(-1)).toBe("Goodbye!");
      expect(await readFile(dataPath(), "utf-8")).toBe("{oops");
    });
  });

  it("ends the session when input runs out mid-action", async () => {
    await roster.students.addStudent({ name: "Nand Patel", age: 20, grade: "A", email: "", phone: "" });
    const io = scriptedIO(["1", "Priya Shah"]);
    await runMenu(roster, io);

    expect(roster.students.store.size).toBe(1);
    expect(await loadStudents(dataPath())).toHaveLength(1);
  });
});
