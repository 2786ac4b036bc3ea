import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { createRagPipeline } from "../rag/pipeline.js";

export function registerIngestCommand(program: Command): void {
  program
    .command("ingest")
    .description("Index a PDF, or every PDF in a directory")
    .argument("<path>", "PDF file or directory of PDFs")
    .option("--append", "Add to the existing index instead of replacing it", false)
    .action(async (target: string, opts: { append: boolean }) => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      const report = await pipeline.ingestPath(target, opts.append ? "append" : "create", (msg) =>
        process.stdout.write(`${msg}\n`),
      );

      const stats = pipeline.index.stats();
      process.stdout.write(
        `Indexed ${report.documents.length} document(s): ${report.added} passage(s) added, ${report.skipped} already present, ${stats.passages} total\n`,
      );
      if (report.emptySources.length > 0) {
        process.stdout.write(`Skipped without text: ${report.emptySources.join(", ")}\n`);
      }
    });
}
