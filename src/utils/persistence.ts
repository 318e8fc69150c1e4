import { readFile, writeFile, copyFile, rename, rm, mkdir, readdir } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { basename, dirname, extname } from "node:path";
import _Ajv from "ajv";
import type { ErrorObject } from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type { StudentRecord } from "../schemas/student.js";
import { studentFileSchema } from "../schemas/student-schema.js";
import {
  CorruptDataError,
  StorageIOError,
  errorMessage,
  isErrnoException,
} from "./errors.js";

const ajv = new Ajv();
const validateStudentFile = ajv.compile<StudentRecord[]>(studentFileSchema);

export function describeSchemaErrors(
  errors: ErrorObject[] | null | undefined,
): string[] {
  return (errors ?? []).map((err) =>
    `${err.instancePath || "/"} ${err.message ?? "is invalid"}`,
  );
}

/**
 * Parse the contents of a data file. Blank content is an empty roster;
 * anything that is not a JSON array of student records is corrupt.
 */
export function parseStudents(content: string, source: string): StudentRecord[] {
  if (content.trim().length === 0) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new CorruptDataError(source, `invalid JSON (${errorMessage(err)})`, {
      cause: err,
    });
  }

  if (!validateStudentFile(parsed)) {
    throw new CorruptDataError(
      source,
      describeSchemaErrors(validateStudentFile.errors).join("; "),
    );
  }
  return parsed;
}

export async function loadStudents(filePath: string): Promise<StudentRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    // First run: no data file yet.
    if (isErrnoException(err) && err.code === "ENOENT") {
      return [];
    }
    throw new StorageIOError(filePath, "read", err);
  }
  return parseStudents(content, filePath);
}

function toStored(record: StudentRecord): StudentRecord {
  return {
    ...(record.id !== undefined && { id: record.id }),
    name: record.name,
    age: record.age,
    grade: record.grade,
    email: record.email,
    phone: record.phone,
    ...(record.created_at !== undefined && { created_at: record.created_at }),
    ...(record.updated_at !== undefined && { updated_at: record.updated_at }),
  };
}

export function serializeStudents(records: readonly StudentRecord[]): string {
  return JSON.stringify(records.map(toStored), null, 2) + "\n";
}

/**
 * Write `targetPath` through a sibling temp file and a rename, so readers
 * only ever see the old or the new content.
 */
async function replaceFile(
  targetPath: string,
  action: string,
  write: (tmpPath: string) => Promise<void>,
): Promise<void> {
  const tmpPath = `${targetPath}.tmp.${randomBytes(8).toString("hex")}`;
  try {
    await mkdir(dirname(targetPath), { recursive: true });
    await write(tmpPath);
    await rename(tmpPath, targetPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw new StorageIOError(targetPath, action, err);
  }
}

export async function saveStudents(
  records: readonly StudentRecord[],
  filePath: string,
): Promise<void> {
  const content = serializeStudents(records);
  await replaceFile(filePath, "write", (tmpPath) =>
    writeFile(tmpPath, content, "utf-8"),
  );
}

export async function backupFile(
  sourcePath: string,
  backupPath: string,
): Promise<void> {
  await replaceFile(backupPath, `back up ${sourcePath} to`, (tmpPath) =>
    copyFile(sourcePath, tmpPath),
  );
}

/**
 * Copy a backup over the data file and load the result. The backup is
 * parsed first; a corrupt one leaves the data file untouched.
 */
export async function restoreFile(
  backupPath: string,
  sourcePath: string,
): Promise<StudentRecord[]> {
  let content: string;
  try {
    content = await readFile(backupPath, "utf-8");
  } catch (err) {
    throw new StorageIOError(backupPath, "read backup", err);
  }
  parseStudents(content, backupPath);

  await replaceFile(sourcePath, `restore ${backupPath} over`, (tmpPath) =>
    copyFile(backupPath, tmpPath),
  );
  return loadStudents(sourcePath);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function timestampedBackupName(dataFile: string, date: Date): string {
  const stem = basename(dataFile, extname(dataFile));
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${stem}.backup-${day}-${time}.json`;
}

/**
 * Backup file names in `dir` for `dataFile`: the plain `.bak` copy first,
 * then timestamped backups, newest first.
 */
export async function listBackups(
  dir: string,
  dataFile: string,
  backupFileName: string = `${dataFile}.bak`,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return [];
    }
    throw new StorageIOError(dir, "list", err);
  }

  const stem = basename(dataFile, extname(dataFile));
  const timestamped = entries
    .filter((name) => name.startsWith(`${stem}.backup-`) && name.endsWith(".json"))
    .sort()
    .reverse();

  return entries.includes(backupFileName)
    ? [backupFileName, ...timestamped]
    : timestamped;
}
