import { IngestionError } from "../../errors.js";
import type { ChunkingStrategy } from "./types.js";
import { WordChunker } from "./word-chunker.js";

const strategies = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  strategies.set(strategy.name, strategy);
}

export function chunkingStrategyNames(): string[] {
  return [...strategies.keys()].sort();
}

/** Looks up a strategy by the name used in `CHUNKING_STRATEGY`. */
export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = strategies.get(name);
  if (!strategy) {
    throw new IngestionError(
      `Unknown chunking strategy "${name}" (available: ${chunkingStrategyNames().join(", ")})`,
    );
  }
  return strategy;
}

registerChunkingStrategy(new WordChunker());

export { WordChunker, chunkText, passageId, DEFAULT_TARGET_WORDS } from "./word-chunker.js";
export type { ChunkingStrategy } from "./types.js";
