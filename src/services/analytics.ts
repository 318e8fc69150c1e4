import { DEFAULT_CONFIG } from "../schemas/config.js";
import type { RecordStore } from "../utils/record-store.js";

export interface StatisticsSummary {
  total: number;
  averageAge: number;
  gradeDistribution: Record<string, number>;
}

/**
 * Read-only aggregates over a record store.
 */
export class AnalyticsService {
  private readonly store: RecordStore;
  private readonly expectedGrades: readonly string[];

  constructor(store: RecordStore, expectedGrades: readonly string[] = DEFAULT_CONFIG.grades) {
    this.store = store;
    this.expectedGrades = expectedGrades;
  }

  totalCount(): number {
    return this.store.size;
  }

  /** Mean age rounded to 2 decimals; 0 for an empty store. */
  averageAge(): number {
    const records = this.store.all();
    if (records.length === 0) {
      return 0;
    }
    const sum = records.reduce((acc, r) => acc + r.age, 0);
    return Math.round((sum / records.length) * 100) / 100;
  }

  /**
   * Count per grade. Expected grades come first (zero when unseen), then
   * any other grade in the order it first appears.
   */
  gradeDistribution(): Record<string, number> {
    const counts = new Map<string, number>();
    for (const grade of this.expectedGrades) {
      counts.set(grade, 0);
    }
    for (const record of this.store.all()) {
      counts.set(record.grade, (counts.get(record.grade) ?? 0) + 1);
    }
    return Object.fromEntries(counts);
  }

  summary(): StatisticsSummary {
    return {
      total: this.totalCount(),
      averageAge: this.averageAge(),
      gradeDistribution: this.gradeDistribution(),
    };
  }
}
