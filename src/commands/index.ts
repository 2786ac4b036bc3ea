import type { Command } from "commander";
import { registerAskCommand } from "./ask.js";
import { registerBackupCommands } from "./backup.js";
import { registerDocumentsCommand } from "./documents.js";
import { registerIngestCommand } from "./ingest.js";
import { registerServeCommand } from "./serve.js";

export function registerCommands(program: Command): void {
  registerServeCommand(program);
  registerIngestCommand(program);
  registerAskCommand(program);
  registerDocumentsCommand(program);
  registerBackupCommands(program);
}
