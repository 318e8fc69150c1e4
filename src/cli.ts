#!/usr/bin/env node

import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerAddCommand } from "./commands/add.js";
import { registerListCommand } from "./commands/list.js";
import { registerSearchCommand } from "./commands/search.js";
import { registerUpdateCommand } from "./commands/update.js";
import { registerDeleteCommand } from "./commands/delete.js";
import { registerStatsCommand } from "./commands/stats.js";
import { registerBackupCommand } from "./commands/backup.js";
import { registerRestoreCommand } from "./commands/restore.js";
import { registerMenuCommand } from "./commands/menu.js";

const program = new Command();

program
  .name("roster")
  .description("Keep a small roll of student records")
  .version("0.1.0")
  .option("--json", "output as structured JSON");

registerInitCommand(program);
registerAddCommand(program);
registerListCommand(program);
registerSearchCommand(program);
registerUpdateCommand(program);
registerDeleteCommand(program);
registerStatsCommand(program);
registerBackupCommand(program);
registerRestoreCommand(program);
registerMenuCommand(program);

await program.parseAsync();
