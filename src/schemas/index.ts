export type {
  SearchCriterion,
  SearchCriteria,
  StudentFields,
  StudentRecord,
  NumberedStudent,
} from "./student.js";

export type { RosterConfig } from "./config.js";
export { DEFAULT_CONFIG } from "./config.js";

export {
  studentSchema,
  studentFieldsSchema,
  studentFileSchema,
  STUDENT_ID_PATTERN,
} from "./student-schema.js";
