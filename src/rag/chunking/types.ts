import type { ExtractedDocument, Passage } from "../types.js";

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: ExtractedDocument, targetWords: number): Passage[];
}
