import type { StudentRecord } from "../schemas/student.js";
import { IndexOutOfRangeError } from "./errors.js";

/**
 * Ordered, in-memory collection of student records for one session.
 * Indexes here are 0-based; display positions are the service's concern.
 */
export class RecordStore {
  private records: StudentRecord[];

  constructor(records: StudentRecord[] = []) {
    this.records = [...records];
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly StudentRecord[] {
    return this.records;
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.records.length;
  }

  get(index: number): StudentRecord {
    this.assertIndex(index);
    return this.records[index];
  }

  append(record: StudentRecord): void {
    this.records.push(record);
  }

  replace(index: number, record: StudentRecord): void {
    this.assertIndex(index);
    this.records[index] = record;
  }

  removeAt(index: number): StudentRecord {
    this.assertIndex(index);
    const [removed] = this.records.splice(index, 1);
    return removed;
  }

  reset(records: readonly StudentRecord[]): void {
    this.records = [...records];
  }

  snapshot(): StudentRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  private assertIndex(index: number): void {
    if (!this.has(index)) {
      throw new IndexOutOfRangeError(index, this.records.length);
    }
  }
}
