#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { registerCommands } from "./commands/index.js";

const program = new Command();

program
  .name("ragline")
  .description("Answer questions over a private PDF corpus and reply over WhatsApp")
  .version("0.1.0");

registerCommands(program);

try {
  await program.parseAsync(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
