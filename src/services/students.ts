import _Ajv from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type {
  NumberedStudent,
  SearchCriteria,
  SearchCriterion,
  StudentFields,
  StudentRecord,
} from "../schemas/student.js";
import { STUDENT_ID_PATTERN, studentFieldsSchema } from "../schemas/student-schema.js";
import { InvalidRecordError, NotFoundError } from "../utils/errors.js";
import { RecordStore } from "../utils/record-store.js";
import {
  backupFile,
  describeSchemaErrors,
  loadStudents,
  restoreFile,
  saveStudents,
} from "../utils/persistence.js";

const ajv = new Ajv();
const validateFields = ajv.compile<StudentFields>(studentFieldsSchema);

const ID_PREFIX = "STU";
const ID_RE = new RegExp(STUDENT_ID_PATTERN);
const SEARCH_CRITERIA: readonly SearchCriterion[] = ["name", "age", "grade"];

export function formatStudentId(n: number): string {
  return `${ID_PREFIX}${String(n).padStart(3, "0")}`;
}

export function nextStudentId(records: readonly StudentRecord[]): string {
  let max = 0;
  for (const record of records) {
    const match = record.id ? ID_RE.exec(record.id) : null;
    if (match) {
      max = Math.max(max, parseInt(match[1], 10));
    }
  }
  return formatStudentId(max + 1);
}

/** Give every record lacking an ID the next free one, in order. */
export function assignMissingIds(records: readonly StudentRecord[]): StudentRecord[] {
  const result: StudentRecord[] = [];
  const pending = records.filter((r) => !r.id);
  if (pending.length === 0) {
    return [...records];
  }
  for (const record of records) {
    if (record.id) {
      result.push(record);
    } else {
      result.push({ ...record, id: nextStudentId([...records, ...result]) });
    }
  }
  return result;
}

function pickFields(fields: StudentFields): StudentFields {
  return {
    name: fields.name,
    age: fields.age,
    grade: fields.grade,
    email: fields.email,
    phone: fields.phone,
  };
}

/** The record's fields with the given changes applied; undefined keeps a field. */
export function mergeStudentFields(
  record: StudentFields,
  changes: Partial<StudentFields>,
): StudentFields {
  return {
    name: changes.name ?? record.name,
    age: changes.age ?? record.age,
    grade: changes.grade ?? record.grade,
    email: changes.email ?? record.email,
    phone: changes.phone ?? record.phone,
  };
}

function parseAge(value: number | string): number | null {
  if (typeof value === "number") {
    return value;
  }
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export interface StudentServiceOptions {
  dataPath: string;
  backupPath: string;
  caseSensitive?: boolean;
  now?: () => Date;
}

/**
 * Add, list, search, update and delete students. Every mutation is saved
 * before it returns; a failed save puts the store back as it was.
 */
export class StudentService {
  readonly store: RecordStore;
  readonly dataPath: string;
  readonly backupPath: string;
  private readonly caseSensitive: boolean;
  private readonly now: () => Date;

  constructor(store: RecordStore, options: StudentServiceOptions) {
    this.store = store;
    this.dataPath = options.dataPath;
    this.backupPath = options.backupPath;
    this.caseSensitive = options.caseSensitive ?? false;
    this.now = options.now ?? (() => new Date());
  }

  static async open(options: StudentServiceOptions): Promise<StudentService> {
    const records = await loadStudents(options.dataPath);
    return new StudentService(new RecordStore(assignMissingIds(records)), options);
  }

  async addStudent(fields: StudentFields): Promise<NumberedStudent> {
    const candidate = this.validate(fields);
    const timestamp = this.now().toISOString();
    const record: StudentRecord = {
      id: nextStudentId(this.store.all()),
      ...candidate,
      created_at: timestamp,
      updated_at: timestamp,
    };
    await this.commit(() => this.store.append(record));
    return { position: this.store.size, record: { ...record } };
  }

  listStudents(): NumberedStudent[] {
    return this.store.all().map((record, i) => ({ position: i + 1, record: { ...record } }));
  }

  getStudent(position: number): NumberedStudent {
    const index = this.toIndex(position);
    return { position, record: { ...this.store.get(index) } };
  }

  /** Look a student up by ID (`STU003`, any case) or by 1-based position. */
  resolveStudent(identifier: string): NumberedStudent {
    const trimmed = identifier.trim();
    const upper = trimmed.toUpperCase();

    if (ID_RE.test(upper)) {
      const index = this.store.all().findIndex((r) => r.id === upper);
      if (index === -1) {
        throw new NotFoundError(identifier, `Student with ID "${upper}" not found.`);
      }
      return this.getStudent(index + 1);
    }

    if (/^\d+$/.test(trimmed)) {
      return this.getStudent(parseInt(trimmed, 10));
    }

    throw new NotFoundError(
      identifier,
      `Identifier "${identifier}" must be a student ID (${formatStudentId(1)}) or a positive integer (1-based position).`,
    );
  }

  /** Students matching one criterion; a blank value is compared like any other. */
  searchStudents(criterion: SearchCriterion, value: string | number): NumberedStudent[] {
    return this.listStudents().filter(({ record }) =>
      this.matchesCriterion(record, criterion, value),
    );
  }

  /** Students matching every given criterion. Blank criteria are ignored. */
  matchStudents(criteria: SearchCriteria): NumberedStudent[] {
    return this.listStudents().filter(({ record }) =>
      SEARCH_CRITERIA.every((criterion) => {
        const value = criteria[criterion];
        return value === undefined || value === "" || this.matchesCriterion(record, criterion, value);
      }),
    );
  }

  async updateStudent(position: number, fields: StudentFields): Promise<NumberedStudent> {
    const index = this.toIndex(position);
    const candidate = this.validate(fields);
    const existing = this.store.get(index);
    const record: StudentRecord = {
      ...(existing.id !== undefined && { id: existing.id }),
      ...candidate,
      ...(existing.created_at !== undefined && { created_at: existing.created_at }),
      updated_at: this.now().toISOString(),
    };
    await this.commit(() => this.store.replace(index, record));
    return { position, record: { ...record } };
  }

  async deleteStudent(position: number): Promise<NumberedStudent> {
    const index = this.toIndex(position);
    const record = await this.commit(() => this.store.removeAt(index));
    return { position, record };
  }

  async save(): Promise<void> {
    await saveStudents(this.store.all(), this.dataPath);
  }

  async backup(backupPath: string = this.backupPath): Promise<string> {
    await this.save();
    await backupFile(this.dataPath, backupPath);
    return backupPath;
  }

  /** Replace the data file and the store with a backup. Returns the record count. */
  async restore(backupPath: string = this.backupPath): Promise<number> {
    const records = await restoreFile(backupPath, this.dataPath);
    this.store.reset(assignMissingIds(records));
    return this.store.size;
  }

  private async commit<T>(mutate: () => T): Promise<T> {
    const before = this.store.snapshot();
    const result = mutate();
    try {
      await this.save();
    } catch (err) {
      this.store.reset(before);
      throw err;
    }
    return result;
  }

  private toIndex(position: number): number {
    if (!Number.isInteger(position) || !this.store.has(position - 1)) {
      throw new NotFoundError(
        String(position),
        `No student at position ${position}. The roster has ${this.store.size} record(s).`,
      );
    }
    return position - 1;
  }

  private validate(fields: StudentFields): StudentFields {
    const candidate = pickFields(fields);
    if (!validateFields(candidate)) {
      throw new InvalidRecordError(describeSchemaErrors(validateFields.errors));
    }
    return candidate;
  }

  private fold(value: string): string {
    return this.caseSensitive ? value : value.toLowerCase();
  }

  private matchesCriterion(
    record: StudentRecord,
    criterion: SearchCriterion,
    value: string | number,
  ): boolean {
    switch (criterion) {
      case "name":
        return this.fold(record.name).includes(this.fold(String(value)));
      case "age": {
        const age = parseAge(value);
        return age !== null && record.age === age;
      }
      case "grade":
        return this.fold(record.grade) === this.fold(String(value));
    }
  }
}
