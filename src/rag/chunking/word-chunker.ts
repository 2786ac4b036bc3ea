import { createHash } from "node:crypto";
import { EmptyDocumentError } from "../../errors.js";
import type { ExtractedDocument, Passage } from "../types.js";
import type { ChunkingStrategy } from "./types.js";

export const DEFAULT_TARGET_WORDS = 300;

export function passageId(sourceId: string, sequenceIndex: number): string {
  return createHash("sha256")
    .update(`${sourceId}\n${sequenceIndex}`)
    .digest("hex")
    .slice(0, 16);
}

/**
 * Splits text into contiguous, non-overlapping groups of `targetWords`
 * whitespace-delimited words. The last passage may be shorter.
 */
export function chunkText(
  documentText: string,
  sourceId: string,
  targetWords: number = DEFAULT_TARGET_WORDS,
): Passage[] {
  if (!Number.isInteger(targetWords) || targetWords < 1) {
    throw new RangeError(`targetWords must be a positive integer, got ${targetWords}`);
  }

  const words = documentText.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) {
    throw new EmptyDocumentError(sourceId);
  }

  const passages: Passage[] = [];
  for (let start = 0; start < words.length; start += targetWords) {
    const sequenceIndex = passages.length;
    passages.push({
      id: passageId(sourceId, sequenceIndex),
      text: words.slice(start, start + targetWords).join(" "),
      sourceDocument: sourceId,
      sequenceIndex,
    });
  }
  return passages;
}

export class WordChunker implements ChunkingStrategy {
  readonly name = "word-chunker";

  chunk(document: ExtractedDocument, targetWords: number): Passage[] {
    const text = document.pages.map((page) => page.text).join("\n");
    return chunkText(text, document.source, targetWords);
  }
}
