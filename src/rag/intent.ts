export type Intent = "greeting" | "farewell" | "question";

export interface IntentMatch {
  intent: Intent;
  confidence: number;
}

const GREETINGS = new Set([
  "hi", "hy", "hii", "hiii", "hai", "hello", "helo", "hey", "hola", "howdy", "sup",
  "greetings", "morning", "afternoon", "evening",
  "good morning", "good afternoon", "good evening", "what's up", "whats up",
]);

const FAREWELLS = new Set([
  "bye", "goodbye", "bye bye", "see you", "take care", "good night",
  "thanks", "thank you", "thanks a lot", "thank you so much", "cheers",
]);

const GREETING_WORDS = /\b(hi|hello|hey|hola|howdy|greetings|good (morning|afternoon|evening))\b/;
const FAREWELL_WORDS = /\b(bye|goodbye|thanks|thank you|take care|good night|cheers)\b/;

function normalise(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}'\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Recognises small talk that should not go through retrieval. Anything longer
 * than three words is treated as a question.
 */
export function classifyIntent(text: string): IntentMatch {
  const normalised = normalise(text);
  if (GREETINGS.has(normalised)) return { intent: "greeting", confidence: 0.99 };
  if (FAREWELLS.has(normalised)) return { intent: "farewell", confidence: 0.99 };

  if (normalised.split(" ").length <= 3) {
    if (GREETING_WORDS.test(normalised)) return { intent: "greeting", confidence: 0.95 };
    if (FAREWELL_WORDS.test(normalised)) return { intent: "farewell", confidence: 0.95 };
  }
  return { intent: "question", confidence: 0.5 };
}

export function quickReply(intent: Intent): string | null {
  switch (intent) {
    case "greeting":
      return "Hello! Ask me anything about the documents I know, and I'll do my best to help.";
    case "farewell":
      return "You're welcome. Take care!";
    case "question":
      return null;
  }
}
