import { z } from "zod";
import { RAG_DEFAULTS } from "./rag/config.js";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  INDEX_DIR: z.string().min(1).default(RAG_DEFAULTS.indexDir),

  EMBEDDING_BASE_URL: z.string().url().default(RAG_DEFAULTS.embeddingBaseUrl),
  EMBEDDING_MODEL: z.string().min(1).default(RAG_DEFAULTS.embeddingModel),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_BATCH_SIZE: positiveInt.default(RAG_DEFAULTS.embeddingBatchSize),
  EMBEDDING_CONCURRENCY: positiveInt.default(RAG_DEFAULTS.embeddingConcurrency),
  EMBEDDING_QUERY_PREFIX: z.string().default(RAG_DEFAULTS.queryPrefix),

  LLM_BASE_URL: z.string().url().default(RAG_DEFAULTS.llmBaseUrl),
  LLM_MODEL: z.string().min(1).default(RAG_DEFAULTS.llmModel),
  LLM_API_KEY: z.string().optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(RAG_DEFAULTS.temperature),
  LLM_MAX_TOKENS: positiveInt.default(RAG_DEFAULTS.maxTokens),
  LLM_DEADLINE_MS: positiveInt.default(RAG_DEFAULTS.deadlineMs),

  CHUNKING_STRATEGY: z.string().min(1).default(RAG_DEFAULTS.chunkingStrategy),
  CHUNK_TARGET_WORDS: positiveInt.default(RAG_DEFAULTS.chunkTargetWords),
  TOP_K: positiveInt.default(RAG_DEFAULTS.topK),
  MAX_TOP_K: positiveInt.default(RAG_DEFAULTS.maxTopK),
  MIN_SCORE: z.coerce.number().min(-1).max(1).default(RAG_DEFAULTS.minScore),
  MAX_REPLY_CHARS: positiveInt.default(RAG_DEFAULTS.maxReplyChars),

  WHATSAPP_ACCESS_TOKEN: z.string().optional(),
  WHATSAPP_PHONE_NUMBER_ID: z.string().optional(),
  WHATSAPP_APP_SECRET: z.string().optional(),
  WHATSAPP_VERIFY_TOKEN: z.string().optional(),
  WHATSAPP_API_VERSION: z.string().default("v18.0"),
  DEDUP_WINDOW_MS: positiveInt.default(10 * 60_000),
  DEDUP_MAX_ENTRIES: positiveInt.default(10_000),
  DISPATCH_MAX_ATTEMPTS: positiveInt.default(3),
  DISPATCH_BASE_DELAY_MS: positiveInt.default(500),

  PORT: positiveInt.default(8000),
});

export interface RagSettings {
  indexDir: string;
  embedding: {
    baseUrl: string;
    model: string;
    apiKey: string | undefined;
    batchSize: number;
    concurrency: number;
    queryPrefix: string;
  };
  llm: {
    baseUrl: string;
    model: string;
    apiKey: string | undefined;
    temperature: number;
    maxTokens: number;
    deadlineMs: number;
  };
  chunkingStrategy: string;
  chunkTargetWords: number;
  topK: number;
  maxTopK: number;
  minScore: number;
  maxReplyChars: number;
}

export interface WhatsAppSettings {
  accessToken: string;
  phoneNumberId: string;
  appSecret: string;
  verifyToken: string;
  apiVersion: string;
}

export interface AppConfig {
  rag: RagSettings;
  /** Null when the WhatsApp credentials are not configured; the webhook routes are then disabled. */
  whatsapp: WhatsAppSettings | null;
  dedup: { windowMs: number; maxEntries: number };
  dispatch: { maxAttempts: number; baseDelayMs: number };
  port: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env templates count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  const whatsappKeys = [
    e.WHATSAPP_ACCESS_TOKEN,
    e.WHATSAPP_PHONE_NUMBER_ID,
    e.WHATSAPP_APP_SECRET,
    e.WHATSAPP_VERIFY_TOKEN,
  ];
  const whatsappCount = whatsappKeys.filter((v) => v !== undefined).length;
  if (whatsappCount > 0 && whatsappCount < whatsappKeys.length) {
    throw new ConfigError([
      "WHATSAPP_ACCESS_TOKEN, WHATSAPP_PHONE_NUMBER_ID, WHATSAPP_APP_SECRET and WHATSAPP_VERIFY_TOKEN must be set together",
    ]);
  }

  const whatsapp: WhatsAppSettings | null =
    e.WHATSAPP_ACCESS_TOKEN &&
    e.WHATSAPP_PHONE_NUMBER_ID &&
    e.WHATSAPP_APP_SECRET &&
    e.WHATSAPP_VERIFY_TOKEN
      ? {
          accessToken: e.WHATSAPP_ACCESS_TOKEN,
          phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID,
          appSecret: e.WHATSAPP_APP_SECRET,
          verifyToken: e.WHATSAPP_VERIFY_TOKEN,
          apiVersion: e.WHATSAPP_API_VERSION,
        }
      : null;

  return {
    rag: {
      indexDir: e.INDEX_DIR,
      embedding: {
        baseUrl: e.EMBEDDING_BASE_URL,
        model: e.EMBEDDING_MODEL,
        apiKey: e.EMBEDDING_API_KEY,
        batchSize: e.EMBEDDING_BATCH_SIZE,
        concurrency: e.EMBEDDING_CONCURRENCY,
        queryPrefix: e.EMBEDDING_QUERY_PREFIX,
      },
      llm: {
        baseUrl: e.LLM_BASE_URL,
        model: e.LLM_MODEL,
        apiKey: e.LLM_API_KEY,
        temperature: e.LLM_TEMPERATURE,
        maxTokens: e.LLM_MAX_TOKENS,
        deadlineMs: e.LLM_DEADLINE_MS,
      },
      chunkingStrategy: e.CHUNKING_STRATEGY,
      chunkTargetWords: e.CHUNK_TARGET_WORDS,
      topK: e.TOP_K,
      maxTopK: e.MAX_TOP_K,
      minScore: e.MIN_SCORE,
      maxReplyChars: e.MAX_REPLY_CHARS,
    },
    whatsapp,
    dedup: { windowMs: e.DEDUP_WINDOW_MS, maxEntries: e.DEDUP_MAX_ENTRIES },
    dispatch: {
      maxAttempts: e.DISPATCH_MAX_ATTEMPTS,
      baseDelayMs: e.DISPATCH_BASE_DELAY_MS,
    },
    port: e.PORT,
  };
}
