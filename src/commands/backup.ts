import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { createRagPipeline } from "../rag/pipeline.js";

export function registerBackupCommands(program: Command): void {
  program
    .command("backup")
    .description("Copy the current index into a named backup")
    .argument("[name]", "Backup name (default: backup-<timestamp>)")
    .action(async (name: string | undefined) => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      const record = await pipeline.index.backup(name);
      process.stdout.write(`Backup created: ${record.name}\n`);
    });

  program
    .command("restore")
    .description("Replace the current index with a backup")
    .argument("<name>", "Backup to restore")
    .action(async (name: string) => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      const result = await pipeline.index.restore(name);
      process.stdout.write(`Restored ${result.restored} (${result.passages} passage(s))\n`);
      if (result.safetyBackup) {
        process.stdout.write(`The previous index was saved as ${result.safetyBackup}\n`);
      }
    });

  program
    .command("backups")
    .description("List index backups")
    .action(async () => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      const backups = await pipeline.index.listBackups();
      if (backups.length === 0) {
        process.stdout.write("No backups found.\n");
        return;
      }
      for (const backup of backups) {
        process.stdout.write(`${backup.name}\t${backup.createdAt ?? "unknown date"}\n`);
      }
    });
}
