import path from "node:path";
import type { RagSettings } from "../config.js";
import { EmptyDocumentError, IngestionError } from "../errors.js";
import { createLogger } from "../logger.js";
import { getChunkingStrategy, chunkText } from "./chunking/index.js";
import { RAG_DEFAULTS, type ResponseStyle } from "./config.js";
import { collectSources } from "./context-builder.js";
import { EmbeddingService, type Embedder } from "./embedding-service.js";
import { listPdfFiles } from "./file-scanner.js";
import { Generator } from "./generator.js";
import { FileIndexStore } from "./index-store.js";
import { classifyIntent, quickReply } from "./intent.js";
import { ChatCompletionClient } from "./llm-client.js";
import { extractPdf } from "./pdf-extractor.js";
import { Retriever } from "./retriever.js";
import type { ExtractedDocument, IngestMode, Passage } from "./types.js";
import { VectorIndex, type BuildResult, type IndexStats } from "./vector-store.js";

const logger = createLogger("pipeline");

export const NO_KNOWLEDGE_BASE_REPLY =
  "I don't have a knowledge base loaded right now, so I can't answer questions about the documents yet. Please try again later.";

export interface QueryRequest {
  question: string;
  k?: number | undefined;
  style?: ResponseStyle | undefined;
}

export interface QueryResponse {
  answer: string;
  sources: string[];
}

export interface IngestReport extends BuildResult {
  source: string;
  passages: number;
}

export interface DocumentPassages {
  source: string;
  passages: number;
}

export interface BatchIngestReport extends BuildResult {
  documents: DocumentPassages[];
  /** PDFs that held no extractable text and were left out. */
  emptySources: string[];
}

interface PreparedDocument {
  source: string;
  passages: Passage[];
}

export interface HealthReport {
  status: "ok" | "degraded";
  index: IndexStats;
  embeddingService: boolean;
  languageModel: boolean;
}

export interface HealthProbes {
  embeddingService(): Promise<boolean>;
  languageModel(): Promise<boolean>;
}

export interface RagPipelineDeps {
  index: VectorIndex;
  embedder: Embedder;
  retriever: Retriever;
  generator: Generator;
  settings: Pick<RagSettings, "chunkingStrategy" | "chunkTargetWords" | "topK" | "minScore"> & {
    temperature: number;
  };
  probes: HealthProbes;
  extract?: (filePath: string) => Promise<ExtractedDocument>;
}

export class RagPipeline {
  private readonly extract: (filePath: string) => Promise<ExtractedDocument>;

  constructor(private readonly deps: RagPipelineDeps) {
    this.extract = deps.extract ?? extractPdf;
  }

  get index(): VectorIndex {
    return this.deps.index;
  }

  private async indexPassages(
    source: string,
    passages: Passage[],
    mode: IngestMode,
    log: (msg: string) => void,
  ): Promise<IngestReport> {
    const { index, embedder } = this.deps;
    log(`RAG: embedding ${source} (${passages.length} passages)...`);
    const result = await index.buildOrAppend(
      passages,
      (fresh) =>
        embedder.embedTexts(
          fresh.map((p) => p.text),
          (done, total) => log(`RAG: embedding ${source}: ${done}/${total}`),
        ),
      mode,
    );
    log(`RAG: ${source} done (${result.added} added, ${result.skipped} already indexed)`);
    return { source, passages: passages.length, ...result };
  }

  /** Chunks and indexes raw text under `sourceId`. */
  async ingestText(
    text: string,
    sourceId: string,
    mode: IngestMode,
    log: (msg: string) => void = (msg) => logger.info(msg),
  ): Promise<IngestReport> {
    const passages = chunkText(text, sourceId, this.deps.settings.chunkTargetWords);
    return this.indexPassages(sourceId, passages, mode, log);
  }

  private async prepare(filePath: string, log: (msg: string) => void): Promise<PreparedDocument> {
    const { settings } = this.deps;
    const strategy = getChunkingStrategy(settings.chunkingStrategy);
    const fileName = path.basename(filePath);

    log(`RAG: extracting ${fileName}...`);
    const doc = await this.extract(filePath);

    log(`RAG: chunking ${fileName} (${doc.pages.length} pages)...`);
    return { source: doc.source, passages: strategy.chunk(doc, settings.chunkTargetWords) };
  }

  /** Extracts, chunks, embeds and indexes one PDF. Failures leave the index as it was. */
  async ingest(
    filePath: string,
    mode: IngestMode,
    log: (msg: string) => void = (msg) => logger.info(msg),
  ): Promise<IngestReport> {
    const { source, passages } = await this.prepare(filePath, log);
    return this.indexPassages(source, passages, mode, log);
  }

  /**
   * Ingests a PDF or every PDF in a directory as one index update. Every file
   * is extracted and chunked before anything is written, so an unreadable file
   * leaves the index as it was. Files without text are skipped.
   */
  async ingestPath(
    target: string,
    mode: IngestMode,
    log: (msg: string) => void = (msg) => logger.info(msg),
  ): Promise<BatchIngestReport> {
    const files = await listPdfFiles(target);
    log(`RAG: found ${files.length} PDF(s) in ${target}`);
    if (files.length === 0) {
      throw new IngestionError(`No PDF files found in ${target}`);
    }

    const documents: DocumentPassages[] = [];
    const emptySources: string[] = [];
    const passages: Passage[] = [];
    for (const file of files) {
      try {
        const prepared = await this.prepare(file, log);
        documents.push({ source: prepared.source, passages: prepared.passages.length });
        passages.push(...prepared.passages);
      } catch (err: unknown) {
        if (!(err instanceof EmptyDocumentError)) throw err;
        log(`RAG: ${err.sourceId} produced no chunks, skipping`);
        emptySources.push(err.sourceId);
      }
    }
    if (passages.length === 0) {
      throw new IngestionError(`No text found in any PDF in ${target}`);
    }

    const { added, skipped } = await this.indexPassages(
      `${documents.length} document(s)`,
      passages,
      mode,
      log,
    );
    return { documents, emptySources, added, skipped };
  }

  async query(request: QueryRequest): Promise<QueryResponse> {
    const { index, retriever, generator, settings } = this.deps;
    const question = request.question.trim();

    const { intent } = classifyIntent(question);
    const quick = quickReply(intent);
    if (quick) {
      logger.debug({ intent }, "Answered small talk without retrieval");
      return { answer: quick, sources: [] };
    }

    if (!index.isLoaded()) {
      return { answer: NO_KNOWLEDGE_BASE_REPLY, sources: [] };
    }

    const started = performance.now();
    const context = await retriever.retrieve(question, request.k ?? settings.topK, settings.minScore);
    const answer = await generator.answer(question, context, settings.temperature, request.style);
    logger.info(
      { passages: context.length, ms: Math.round(performance.now() - started) },
      "Query answered",
    );
    return { answer, sources: collectSources(context) };
  }

  async health(): Promise<HealthReport> {
    const { index, probes } = this.deps;
    const [embeddingService, languageModel] = await Promise.all([
      probes.embeddingService(),
      probes.languageModel(),
    ]);
    const stats = index.stats();
    return {
      status: stats.loaded && embeddingService && languageModel ? "ok" : "degraded",
      index: stats,
      embeddingService,
      languageModel,
    };
  }
}

/** Wires the pipeline against the configured HTTP services and on-disk index. */
export function createRagPipeline(settings: RagSettings): RagPipeline {
  const embedder = new EmbeddingService({
    baseUrl: settings.embedding.baseUrl,
    model: settings.embedding.model,
    apiKey: settings.embedding.apiKey,
    batchSize: settings.embedding.batchSize,
    concurrency: settings.embedding.concurrency,
    queryPrefix: settings.embedding.queryPrefix,
    timeoutMs: RAG_DEFAULTS.embeddingTimeoutMs,
  });
  const llm = new ChatCompletionClient({
    baseUrl: settings.llm.baseUrl,
    model: settings.llm.model,
    apiKey: settings.llm.apiKey,
  });
  const index = new VectorIndex({
    store: new FileIndexStore(path.resolve(settings.indexDir)),
    embeddingModel: embedder.model,
  });

  return new RagPipeline({
    index,
    embedder,
    retriever: new Retriever({ index, embedder, maxTopK: settings.maxTopK }),
    generator: new Generator({
      model: llm,
      deadlineMs: settings.llm.deadlineMs,
      maxTokens: settings.llm.maxTokens,
      maxReplyChars: settings.maxReplyChars,
    }),
    settings: {
      chunkingStrategy: settings.chunkingStrategy,
      chunkTargetWords: settings.chunkTargetWords,
      topK: settings.topK,
      minScore: settings.minScore,
      temperature: settings.llm.temperature,
    },
    probes: {
      embeddingService: () => embedder.ping(),
      languageModel: () => llm.ping(),
    },
  });
}
