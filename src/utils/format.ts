import type { NumberedStudent, StudentRecord } from "../schemas/student.js";
import type { StatisticsSummary } from "../services/analytics.js";

export type SortKey = "position" | "name" | "age" | "grade";

function idTag(r: StudentRecord): string {
  return r.id ? `[${r.id}] ` : "";
}

export function getStudentSummary(r: StudentRecord): string {
  return `${r.name} (age ${r.age}, grade ${r.grade})`;
}

export function formatStudent({ position, record }: NumberedStudent): string {
  const lines = [
    `#${position} ${idTag(record)}${record.name}`,
    `  Age: ${record.age}`,
    `  Grade: ${record.grade}`,
  ];
  if (record.email) lines.push(`  Email: ${record.email}`);
  if (record.phone) lines.push(`  Phone: ${record.phone}`);
  if (record.updated_at) lines.push(`  Updated: ${record.updated_at}`);
  return lines.join("\n");
}

export function formatStudentList(
  students: readonly NumberedStudent[],
  heading = "Students",
): string {
  if (students.length === 0) {
    return "No student records found.";
  }
  const noun = students.length === 1 ? "record" : "records";
  const blocks = students.map(formatStudent);
  return [`## ${heading} (${students.length} ${noun})`, ...blocks].join("\n\n");
}

export function sortStudents(
  students: readonly NumberedStudent[],
  key: SortKey,
): NumberedStudent[] {
  const sorted = [...students];
  switch (key) {
    case "position":
      return sorted;
    case "name":
      return sorted.sort((a, b) => a.record.name.localeCompare(b.record.name));
    case "age":
      return sorted.sort((a, b) => a.record.age - b.record.age);
    case "grade":
      return sorted.sort((a, b) => a.record.grade.localeCompare(b.record.grade));
  }
}

export function formatStatistics(summary: StatisticsSummary): string {
  const lines = [
    `Total Students: ${summary.total}`,
    `Average Age: ${summary.averageAge}`,
    "",
    "Grade Distribution:",
  ];
  for (const [grade, count] of Object.entries(summary.gradeDistribution)) {
    lines.push(`  ${grade}: ${count} student(s)`);
  }
  return lines.join("\n");
}
