import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { createRagPipeline } from "../rag/pipeline.js";

export function registerDocumentsCommand(program: Command): void {
  program
    .command("documents")
    .description("List the documents in the index")
    .action(async () => {
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      await pipeline.index.load();

      const stats = pipeline.index.stats();
      if (stats.documents.length === 0) {
        process.stdout.write("The index is empty.\n");
        return;
      }
      for (const doc of stats.documents) {
        process.stdout.write(`${doc.source}\t${doc.passageCount} passage(s)\t${doc.ingestedAt}\n`);
      }
      process.stdout.write(
        `\n${stats.documents.length} document(s), ${stats.passages} passage(s), ${stats.dimension}-dimensional vectors (${stats.embeddingModel ?? "unknown model"})\n`,
      );
    });
}
