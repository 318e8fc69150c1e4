export type SearchCriterion = "name" | "age" | "grade";

/** The five fields every stored student carries. */
export interface StudentFields {
  name: string;
  age: number;
  grade: string;
  email: string;
  phone: string;
}

export interface StudentRecord extends StudentFields {
  id?: string;
  created_at?: string;
  updated_at?: string;
}

/** A record paired with its 1-based display position. */
export interface NumberedStudent {
  position: number;
  record: StudentRecord;
}

export interface SearchCriteria {
  name?: string;
  age?: number | string;
  grade?: string;
}
