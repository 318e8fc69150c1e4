export interface RosterConfig {
  data_file: string;
  backup_file: string;
  grades: string[];
  search: {
    case_sensitive: boolean;
  };
}

export const DEFAULT_CONFIG: RosterConfig = {
  data_file: "students.json",
  backup_file: "students.json.bak",
  grades: ["A", "B", "C", "D"],
  search: {
    case_sensitive: false,
  },
};
