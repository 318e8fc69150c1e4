// Type exports
export type {
  SearchCriterion,
  SearchCriteria,
  StudentFields,
  StudentRecord,
  NumberedStudent,
} from "./schemas/index.js";

export type { RosterConfig } from "./schemas/index.js";
export { DEFAULT_CONFIG } from "./schemas/index.js";

// Schema exports
export { studentSchema, studentFieldsSchema, studentFileSchema } from "./schemas/index.js";

// Config utilities
export { readConfig, writeConfig, initRosterDir, getDataPath, getBackupPath } from "./utils/config.js";

// Store and persistence
export { RecordStore } from "./utils/record-store.js";
export {
  loadStudents,
  saveStudents,
  backupFile,
  restoreFile,
  listBackups,
  timestampedBackupName,
} from "./utils/persistence.js";

// Errors
export {
  RosterError,
  IndexOutOfRangeError,
  NotFoundError,
  CorruptDataError,
  StorageIOError,
  InvalidRecordError,
} from "./utils/errors.js";
export type { RosterErrorCode } from "./utils/errors.js";

// Services
export { StudentService, mergeStudentFields, nextStudentId } from "./services/students.js";
export type { StudentServiceOptions } from "./services/students.js";
export { AnalyticsService } from "./services/analytics.js";
export type { StatisticsSummary } from "./services/analytics.js";
export { openRoster } from "./services/roster.js";
export type { Roster } from "./services/roster.js";
