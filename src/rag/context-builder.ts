import { RESPONSE_STYLES, type ResponseStyle } from "./config.js";
import type { RetrievalResult } from "./types.js";

const SYSTEM_RULES = [
  "You are an information assistant answering questions from a private document collection.",
  "",
  "RULES:",
  "1. Answer ONLY from the document excerpts below. If they do not contain the answer, say you don't have that information.",
  "2. Answer directly and naturally. Do not mention \"context\", \"documents\", \"excerpts\" or \"information provided\".",
  "3. Never make up numbers, statistics or names.",
].join("\n");

/**
 * Grounded prompt: rules, then each passage under its source label in
 * retrieval order (most relevant first), then the question.
 */
export function buildPrompt(
  question: string,
  context: RetrievalResult,
  style: ResponseStyle = "moderate",
): string {
  const contextParts = context.map(({ passage }) => {
    const citation = `[Source: ${passage.sourceDocument}, Part ${passage.sequenceIndex + 1}]`;
    return `${citation}\n${passage.text}`;
  });

  return (
    `${SYSTEM_RULES}\n4. ${RESPONSE_STYLES[style].instruction}\n\n` +
    "--- Document Excerpts ---\n" +
    contextParts.join("\n\n") +
    `\n\nUser Question: ${question.trim()}\n\nDirect Answer:`
  );
}

/** Used when retrieval found nothing relevant, so the model does not answer from thin air. */
export function buildFallbackPrompt(question: string): string {
  return (
    "You are an information assistant for a private document collection. " +
    "No passage in the collection is relevant to the user's question. " +
    "Reply in one or two sentences that you don't have information about this topic, " +
    "and do not attempt to answer it from general knowledge.\n\n" +
    `User Question: ${question.trim()}\n\nReply:`
  );
}

/** Distinct source documents in the order they first appear. */
export function collectSources(context: RetrievalResult): string[] {
  const seen = new Set<string>();
  for (const { passage } of context) {
    seen.add(passage.sourceDocument);
  }
  return [...seen];
}
