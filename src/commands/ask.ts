import { Option, type Command } from "commander";
import { loadConfig } from "../config.js";
import { RESPONSE_STYLE_NAMES, isResponseStyle } from "../rag/config.js";
import { createRagPipeline } from "../rag/pipeline.js";

export function registerAskCommand(program: Command): void {
  program
    .command("ask")
    .description("Answer one question from the index")
    .argument("<question...>", "Question to answer")
    .option("-k, --top-k <n>", "Passages to retrieve")
    .addOption(new Option("-s, --style <style>", "Answer length").choices(RESPONSE_STYLE_NAMES))
    .action(async (words: string[], opts: { topK?: string; style?: string }) => {
      const question = words.join(" ").trim();
      const config = loadConfig();
      const pipeline = createRagPipeline(config.rag);
      await pipeline.index.load();

      const k = opts.topK === undefined ? undefined : Number.parseInt(opts.topK, 10);
      if (k !== undefined && !(k > 0)) {
        throw new Error(`--top-k must be a positive integer, got "${opts.topK}"`);
      }

      const style = opts.style !== undefined && isResponseStyle(opts.style) ? opts.style : undefined;

      const { answer, sources } = await pipeline.query({ question, k, style });
      process.stdout.write(`${answer}\n`);
      if (sources.length > 0) {
        process.stdout.write(`\nSources: ${sources.join(" | ")}\n`);
      }
    });
}
