export const RAG_DEFAULTS = {
  indexDir: ".rag-index",

  embeddingBaseUrl: "http://localhost:11434/v1",
  embeddingModel: "nomic-embed-text",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  embeddingTimeoutMs: 30_000,

  queryPrefix: "",

  llmBaseUrl: "http://localhost:11434/v1",
  llmModel: "mistral",
  temperature: 0.7,
  maxTokens: 500,
  deadlineMs: 60_000,

  chunkingStrategy: "word-chunker",
  chunkTargetWords: 300,

  topK: 3,
  maxTopK: 10,
  minScore: 0.3,

  maxReplyChars: 1500,
} as const;

export const RESPONSE_STYLE_NAMES = ["brief", "moderate", "detailed"] as const;

export type ResponseStyle = (typeof RESPONSE_STYLE_NAMES)[number];

/** Per-style answer length: the prompt instruction plus the token and character caps. */
export const RESPONSE_STYLES = {
  brief: {
    instruction: "Answer in 2-3 complete sentences, at most 80 words.",
    maxTokens: 300,
    maxReplyChars: 1000,
  },
  moderate: {
    instruction: "Answer in 3-5 complete sentences, at most 150 words.",
    maxTokens: 500,
    maxReplyChars: 1500,
  },
  detailed: {
    instruction: "Give a complete explanation with all the important information, at most 400 words.",
    maxTokens: 800,
    maxReplyChars: 2500,
  },
} as const satisfies Record<ResponseStyle, { instruction: string; maxTokens: number; maxReplyChars: number }>;

export function isResponseStyle(value: string): value is ResponseStyle {
  return RESPONSE_STYLE_NAMES.some((name) => name === value);
}
