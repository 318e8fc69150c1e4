import type { RosterConfig } from "../schemas/config.js";
import { getBackupPath, getDataPath, getRosterDir, readConfig } from "../utils/config.js";
import { RecordStore } from "../utils/record-store.js";
import { AnalyticsService } from "./analytics.js";
import { StudentService } from "./students.js";

export interface Roster {
  config: RosterConfig;
  dir: string;
  students: StudentService;
  analytics: AnalyticsService;
}

export interface OpenRosterOptions {
  /** Skip reading the data file and start from an empty store. */
  load?: boolean;
}

/**
 * Read the config in `cwd` and load its data file into a fresh session.
 * Throws ENOENT when `.roster/` has not been initialized.
 */
export async function openRoster(
  cwd: string = process.cwd(),
  options: OpenRosterOptions = {},
): Promise<Roster> {
  const config = await readConfig(cwd);
  const serviceOptions = {
    dataPath: getDataPath(config, cwd),
    backupPath: getBackupPath(config, cwd),
    caseSensitive: config.search.case_sensitive,
  };
  const students =
    options.load === false
      ? new StudentService(new RecordStore(), serviceOptions)
      : await StudentService.open(serviceOptions);
  return {
    config,
    dir: getRosterDir(cwd),
    students,
    analytics: new AnalyticsService(students.store, config.grades),
  };
}
