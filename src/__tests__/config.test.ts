import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../config.js";

const whatsappEnv = {
  WHATSAPP_ACCESS_TOKEN: "test-token",
  WHATSAPP_PHONE_NUMBER_ID: "123456",
  WHATSAPP_APP_SECRET: "test-secret",
  WHATSAPP_VERIFY_TOKEN: "test-verify",
};

describe("loadConfig", () => {
  it("fills in defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.rag).toMatchObject({
      indexDir: ".rag-index",
      chunkingStrategy: "word-chunker",
      chunkTargetWords: 300,
      topK: 3,
      maxTopK: 10,
      minScore: 0.3,
      maxReplyChars: 1500,
    });
    expect(config.rag.embedding).toMatchObject({ model: "nomic-embed-text", apiKey: undefined });
    expect(config.rag.llm).toMatchObject({ model: "mistral", temperature: 0.7, deadlineMs: 60_000 });
    expect(config.whatsapp).toBeNull();
    expect(config.dedup).toEqual({ windowMs: 600_000, maxEntries: 10_000 });
    expect(config.dispatch).toEqual({ maxAttempts: 3, baseDelayMs: 500 });
    expect(config.port).toBe(8000);
  });

  it("coerces numeric settings from strings", () => {
    const config = loadConfig({ TOP_K: "5", MIN_SCORE: "0.25", LLM_DEADLINE_MS: "15000", PORT: "9000" });

    expect(config.rag.topK).toBe(5);
    expect(config.rag.minScore).toBe(0.25);
    expect(config.rag.llm.deadlineMs).toBe(15_000);
    expect(config.port).toBe(9000);
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ TOP_K: "", LLM_API_KEY: "" }).rag.topK).toBe(3);
    expect(loadConfig({ LLM_API_KEY: "" }).rag.llm.apiKey).toBeUndefined();
  });

  it("builds WhatsApp settings when all credentials are present", () => {
    expect(loadConfig(whatsappEnv).whatsapp).toEqual({
      accessToken: "test-token",
      phoneNumberId: "123456",
      appSecret: "test-secret",
      verifyToken: "test-verify",
      apiVersion: "v18.0",
    });
  });

  it("rejects a partial set of WhatsApp credentials", () => {
    expect(() => loadConfig({ WHATSAPP_ACCESS_TOKEN: "test-token" })).toThrow(ConfigError);
  });

  it("lists every invalid value", () => {
    const error = (() => {
      try {
        loadConfig({ TOP_K: "zero", EMBEDDING_BASE_URL: "not a url" });
      } catch (err: unknown) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("issues");
    if (error instanceof ConfigError) {
      expect(error.issues.map((issue) => issue.split(":")[0]).sort()).toEqual(["EMBEDDING_BASE_URL", "TOP_K"]);
    }
  });
});
