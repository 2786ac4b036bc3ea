import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentReadError, IngestionError } from "../../errors.js";
import { FileIndexStore } from "../index-store.js";
import { Generator } from "../generator.js";
import { NO_KNOWLEDGE_BASE_REPLY, RagPipeline } from "../pipeline.js";
import { Retriever } from "../retriever.js";
import type { ExtractedDocument } from "../types.js";
import { VectorIndex } from "../vector-store.js";
import { ScriptedModel, VocabularyEmbedder, makeTempDir, removeDir } from "./fakes.js";

let root: string;

beforeEach(async () => {
  root = await makeTempDir("pipeline");
});

afterEach(async () => {
  await removeDir(root);
});

interface PipelineOptions {
  reply?: string;
  probes?: { embeddingService: boolean; languageModel: boolean };
  pages?: Record<string, string[]>;
  unreadable?: string[];
  chunkTargetWords?: number;
}

function makePipeline(options: PipelineOptions = {}) {
  const embedder = new VocabularyEmbedder();
  const model = new ScriptedModel(async () => options.reply ?? "A reply.");
  const index = new VectorIndex({
    store: new FileIndexStore(path.join(root, "index")),
    embeddingModel: embedder.model,
  });
  const probes = options.probes ?? { embeddingService: true, languageModel: true };

  const pipeline = new RagPipeline({
    index,
    embedder,
    retriever: new Retriever({ index, embedder, maxTopK: 10 }),
    generator: new Generator({ model, deadlineMs: 1_000, maxTokens: 200, maxReplyChars: 1_500 }),
    settings: {
      chunkingStrategy: "word-chunker",
      chunkTargetWords: options.chunkTargetWords ?? 300,
      topK: 3,
      minScore: 0.1,
      temperature: 0.7,
    },
    probes: {
      embeddingService: async () => probes.embeddingService,
      languageModel: async () => probes.languageModel,
    },
    extract: async (filePath: string): Promise<ExtractedDocument> => {
      const source = path.basename(filePath);
      if (options.unreadable?.includes(source)) {
        throw new DocumentReadError(filePath, new Error("bad xref table"));
      }
      const texts = options.pages?.[source] ?? ["placeholder text"];
      return {
        source,
        filePath,
        pages: texts.map((text, i) => ({ pageNumber: i + 1, text })),
      };
    },
  });
  return { pipeline, model, embedder };
}

describe("RagPipeline", () => {
  it("answers a question from an ingested document", async () => {
    const { pipeline, model } = makePipeline({
      reply: "Based on the context, vitiligo is a skin condition that causes loss of pigment.",
    });
    const report = await pipeline.ingestText(
      "Vitiligo is a skin condition causing loss of pigment.",
      "vitiligo.pdf",
      "create",
    );
    expect(report.passages).toBe(1);

    const response = await pipeline.query({ question: "What is vitiligo?", k: 3 });

    expect(response).toEqual({
      answer: "Vitiligo is a skin condition that causes loss of pigment.",
      sources: ["vitiligo.pdf"],
    });
    expect(model.requests[0]?.prompt).toContain(
      "[Source: vitiligo.pdf, Part 1]\nVitiligo is a skin condition causing loss of pigment.\n\nUser Question: What is vitiligo?",
    );
  });

  it("falls back to an admission when nothing relevant is indexed", async () => {
    const { pipeline, model } = makePipeline({ reply: "I don't have information about that." });
    await pipeline.ingestText("Vitiligo is a skin condition causing loss of pigment.", "vitiligo.pdf", "create");

    const response = await pipeline.query({ question: "Who painted the ceiling chapel frescoes?" });

    expect(response).toEqual({ answer: "I don't have information about that.", sources: [] });
    expect(model.requests[0]?.prompt.endsWith("Reply:")).toBe(true);
  });

  it("answers small talk without retrieval or generation", async () => {
    const { pipeline, model, embedder } = makePipeline();

    const response = await pipeline.query({ question: "hi!" });

    expect(response.answer).toBe("Hello! Ask me anything about the documents I know, and I'll do my best to help.");
    expect(model.requests).toHaveLength(0);
    expect(embedder.queryCalls).toBe(0);
  });

  it("explains that no knowledge base is loaded", async () => {
    const { pipeline, model } = makePipeline();

    expect(await pipeline.query({ question: "What is vitiligo?" })).toEqual({
      answer: NO_KNOWLEDGE_BASE_REPLY,
      sources: [],
    });
    expect(model.requests).toHaveLength(0);
  });

  it("ingests an extracted PDF and skips passages it already holds", async () => {
    const { pipeline } = makePipeline({
      pages: { "guide.pdf": ["one two three", "four five six"] },
      chunkTargetWords: 4,
    });

    const created = await pipeline.ingest(path.join(root, "guide.pdf"), "create", () => undefined);
    const again = await pipeline.ingest(path.join(root, "guide.pdf"), "append", () => undefined);

    expect(created).toEqual({ source: "guide.pdf", passages: 2, added: 2, skipped: 0 });
    expect(again).toEqual({ source: "guide.pdf", passages: 2, added: 0, skipped: 2 });
  });

  it("ingests every PDF in a directory", async () => {
    const docs = path.join(root, "docs");
    await makeDocsDir(docs, ["b.pdf", "a.pdf", "notes.txt"]);
    const { pipeline } = makePipeline({
      pages: { "a.pdf": ["apples grow on trees"], "b.pdf": ["bees make honey"] },
    });
    const messages: string[] = [];

    const report = await pipeline.ingestPath(docs, "create", (msg) => messages.push(msg));

    expect(report).toEqual({
      documents: [
        { source: "a.pdf", passages: 1 },
        { source: "b.pdf", passages: 1 },
      ],
      emptySources: [],
      added: 2,
      skipped: 0,
    });
    expect(pipeline.index.stats().documents.map((d) => d.source)).toEqual(["a.pdf", "b.pdf"]);
    expect(messages[0]).toBe(`RAG: found 2 PDF(s) in ${docs}`);
  });

  it("skips PDFs without text and commits the rest in one update", async () => {
    const docs = path.join(root, "docs");
    await makeDocsDir(docs, ["a.pdf", "b.pdf"]);
    const { pipeline } = makePipeline({ pages: { "a.pdf": ["apples"], "b.pdf": ["   "] } });
    await pipeline.ingestText("old corpus text", "old.pdf", "create", () => undefined);
    const messages: string[] = [];

    const report = await pipeline.ingestPath(docs, "create", (msg) => messages.push(msg));

    expect(report.documents).toEqual([{ source: "a.pdf", passages: 1 }]);
    expect(report.emptySources).toEqual(["b.pdf"]);
    expect(messages).toContain("RAG: b.pdf produced no chunks, skipping");
    expect(pipeline.index.stats().documents.map((d) => d.source)).toEqual(["a.pdf"]);
  });

  it("leaves the previous index in place when a PDF in the directory cannot be read", async () => {
    const docs = path.join(root, "docs");
    await makeDocsDir(docs, ["a.pdf", "c.pdf"]);
    const { pipeline, embedder } = makePipeline({ pages: { "a.pdf": ["apples"] }, unreadable: ["c.pdf"] });
    await pipeline.ingestText("old corpus text", "old.pdf", "create", () => undefined);

    await expect(pipeline.ingestPath(docs, "create", () => undefined)).rejects.toBeInstanceOf(DocumentReadError);

    expect(pipeline.index.stats().documents.map((d) => d.source)).toEqual(["old.pdf"]);
    const reopened = new VectorIndex({
      store: new FileIndexStore(path.join(root, "index")),
      embeddingModel: embedder.model,
    });
    await reopened.load();
    expect(reopened.stats().documents.map((d) => d.source)).toEqual(["old.pdf"]);
  });

  it("rejects a directory without any PDFs", async () => {
    const docs = path.join(root, "docs");
    await makeDocsDir(docs, ["notes.txt"]);
    const { pipeline } = makePipeline();

    await expect(pipeline.ingestPath(docs, "create", () => undefined)).rejects.toBeInstanceOf(IngestionError);
  });

  it("passes the response style through to generation", async () => {
    const { pipeline, model } = makePipeline({ reply: "Vitiligo causes loss of pigment." });
    await pipeline.ingestText("Vitiligo is a skin condition causing loss of pigment.", "vitiligo.pdf", "create");

    await pipeline.query({ question: "What is vitiligo?", style: "detailed" });

    expect(model.requests[0]?.maxTokens).toBe(800);
  });

  it("reports health from the index and both services", async () => {
    const healthy = makePipeline();
    await healthy.pipeline.index.load();
    expect((await healthy.pipeline.health()).status).toBe("ok");

    const noModel = makePipeline({ probes: { embeddingService: true, languageModel: false } });
    await noModel.pipeline.index.load();
    const report = await noModel.pipeline.health();
    expect(report.status).toBe("degraded");
    expect(report.languageModel).toBe(false);

    const unloaded = makePipeline();
    expect((await unloaded.pipeline.health()).status).toBe("degraded");
  });
});

async function makeDocsDir(dir: string, names: string[]): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const name of names) {
    await writeFile(path.join(dir, name), "", "utf-8");
  }
}
