/** `STU` and a zero-padded number of at least three digits. */
export const STUDENT_ID_PATTERN = "^STU(\\d{3,})$";

export const studentFieldsSchema = {
  type: "object",
  properties: {
    name: { type: "string" },
    age: { type: "integer" },
    grade: { type: "string" },
    email: { type: "string" },
    phone: { type: "string" },
  },
  required: ["name", "age", "grade", "email", "phone"],
  additionalProperties: false,
};

export const studentSchema = {
  type: "object",
  properties: {
    ...studentFieldsSchema.properties,
    id: { type: "string", pattern: STUDENT_ID_PATTERN },
    created_at: { type: "string" },
    updated_at: { type: "string" },
  },
  required: studentFieldsSchema.required,
  additionalProperties: false,
};

export const studentFileSchema = {
  type: "array",
  items: studentSchema,
};
