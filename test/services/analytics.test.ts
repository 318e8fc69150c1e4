import { describe, it, expect } from "vitest";
import { AnalyticsService } from "../../src/services/analytics.js";
import { RecordStore } from "../../src/utils/record-store.js";
import type { StudentRecord } from "../../src/schemas/student.js";

const student = (age: number, grade: string): StudentRecord => ({
  name: `Student ${age}${grade}`,
  age,
  grade,
  email: "",
  phone: "",
});

const analyticsFor = (records: StudentRecord[], grades?: string[]): AnalyticsService =>
  new AnalyticsService(new RecordStore(records), grades);

describe("AnalyticsService", () => {
  it("counts records", () => {
    expect(analyticsFor([]).totalCount()).toBe(0);
    expect(analyticsFor([student(20, "A"), student(21, "B")]).totalCount()).toBe(2);
  });

  it("averages ages", () => {
    expect(analyticsFor([student(20, "A"), student(22, "A"), student(24, "B")]).averageAge()).toBe(22);
  });

  it("returns 0 as the average of an empty store", () => {
    expect(analyticsFor([]).averageAge()).toBe(0);
  });

  it("rounds the average to two decimals", () => {
    expect(analyticsFor([student(20, "A"), student(21, "A"), student(21, "A")]).averageAge()).toBe(20.67);
  });

  it("reports unseen expected grades as zero", () => {
    const analytics = analyticsFor([student(20, "A"), student(21, "A"), student(22, "B")]);
    expect(analytics.gradeDistribution()).toEqual({ A: 2, B: 1, C: 0, D: 0 });
  });

  it("appends unexpected grades after the expected ones", () => {
    const analytics = analyticsFor([student(20, "F"), student(21, "B"), student(22, "a")]);
    expect(Object.entries(analytics.gradeDistribution())).toEqual([
      ["A", 0],
      ["B", 1],
      ["C", 0],
      ["D", 0],
      ["F", 1],
      ["a", 1],
    ]);
  });

  it("uses a custom expected grade set", () => {
    const analytics = analyticsFor([student(20, "Pass")], ["Pass", "Fail"]);
    expect(analytics.gradeDistribution()).toEqual({ Pass: 1, Fail: 0 });
  });

  it("reflects later changes to the store", () => {
    const store = new RecordStore();
    const analytics = new AnalyticsService(store);
    store.append(student(30, "C"));
    expect(analytics.summary()).toEqual({
      total: 1,
      averageAge: 30,
      gradeDistribution: { A: 0, B: 0, C: 1, D: 0 },
    });
  });
});
