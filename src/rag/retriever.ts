import { EmbeddingModelMismatchError, IndexUnavailableError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Embedder } from "./embedding-service.js";
import type { RetrievalResult } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

const logger = createLogger("retriever");

export interface RetrieverOptions {
  index: VectorIndex;
  embedder: Embedder;
  maxTopK: number;
}

/** Stateless; safe to share between concurrent requests. */
export class Retriever {
  constructor(private readonly options: RetrieverOptions) {}

  async retrieve(query: string, k: number, minScore: number): Promise<RetrievalResult> {
    const { index, embedder, maxTopK } = this.options;
    if (!index.isLoaded()) throw new IndexUnavailableError();
    if (index.stats().passages === 0) return [];

    const indexModel = index.indexModel();
    if (indexModel !== null && indexModel !== embedder.model) {
      throw new EmbeddingModelMismatchError(indexModel, embedder.model);
    }

    const topK = Math.max(1, Math.min(Math.floor(k), maxTopK));
    const queryVector = await embedder.embedQuery(query);
    const results = await index.search(queryVector, topK);
    const kept = results.filter((r) => r.score >= minScore);

    logger.debug(
      { topK, candidates: results.length, kept: kept.length, minScore },
      "Retrieved passages",
    );
    return kept;
  }
}
