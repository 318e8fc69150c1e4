import { readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import type { RosterConfig } from "../schemas/config.js";
import { DEFAULT_CONFIG } from "../schemas/config.js";

const ROSTER_DIR = ".roster";
const CONFIG_FILE = "roster.config.yaml";

export const ROSTER_README = `# .roster/

This directory is managed by roster, a small student record keeper.

## Key Commands

- \`roster add\`      — Add a student
- \`roster list\`     — List every student with its position and ID
- \`roster search\`   — Search by name, age or grade
- \`roster update\`   — Replace fields of a student
- \`roster delete\`   — Remove a student
- \`roster stats\`    — Count, average age and grade distribution
- \`roster backup\`   — Copy the data file to a backup
- \`roster restore\`  — Replace the data file with a backup
- \`roster menu\`     — Interactive menu

## Structure

- \`roster.config.yaml\` — Configuration file
- \`students.json\`      — Student records (JSON array)
- \`students.json.bak\`  — Latest backup
`;

export function getRosterDir(cwd: string = process.cwd()): string {
  return join(cwd, ROSTER_DIR);
}

export function getConfigPath(cwd: string = process.cwd()): string {
  return join(getRosterDir(cwd), CONFIG_FILE);
}

function validateFileName(kind: string, name: string): void {
  if (!/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/.test(name)) {
    throw new Error(
      `Invalid ${kind}: "${name}". Only alphanumeric characters, dots, hyphens, and underscores are allowed.`,
    );
  }
}

export function getDataPath(
  config: RosterConfig,
  cwd: string = process.cwd(),
): string {
  validateFileName("data_file", config.data_file);
  return join(getRosterDir(cwd), config.data_file);
}

export function getBackupPath(
  config: RosterConfig,
  cwd: string = process.cwd(),
): string {
  validateFileName("backup_file", config.backup_file);
  return join(getRosterDir(cwd), config.backup_file);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Overlay a parsed YAML document on DEFAULT_CONFIG. Keys with the wrong
 * type fall back to their defaults.
 */
export function mergeConfig(raw: unknown): RosterConfig {
  const config: RosterConfig = {
    ...DEFAULT_CONFIG,
    grades: [...DEFAULT_CONFIG.grades],
    search: { ...DEFAULT_CONFIG.search },
  };
  if (!isPlainObject(raw)) {
    return config;
  }

  if (typeof raw.data_file === "string") config.data_file = raw.data_file;
  if (typeof raw.backup_file === "string") config.backup_file = raw.backup_file;
  if (Array.isArray(raw.grades)) {
    config.grades = raw.grades.map((g) => String(g));
  }
  if (isPlainObject(raw.search) && typeof raw.search.case_sensitive === "boolean") {
    config.search.case_sensitive = raw.search.case_sensitive;
  }
  return config;
}

export async function readConfig(
  cwd: string = process.cwd(),
): Promise<RosterConfig> {
  const configPath = getConfigPath(cwd);
  const content = await readFile(configPath, "utf-8");
  return mergeConfig(yaml.load(content));
}

export async function writeConfig(
  config: RosterConfig,
  cwd: string = process.cwd(),
): Promise<void> {
  const configPath = getConfigPath(cwd);
  const content = yaml.dump(config, { lineWidth: -1 });
  await writeFile(configPath, content, "utf-8");
}

export async function initRosterDir(
  cwd: string = process.cwd(),
): Promise<void> {
  const rosterDir = getRosterDir(cwd);
  await mkdir(rosterDir, { recursive: true });

  // Only write default config if none exists — preserve user customizations
  const configPath = getConfigPath(cwd);
  if (!existsSync(configPath)) {
    await writeConfig(DEFAULT_CONFIG, cwd);
  }

  const readmePath = join(rosterDir, "README.md");
  if (!existsSync(readmePath)) {
    await writeFile(readmePath, ROSTER_README, "utf-8");
  }
}
