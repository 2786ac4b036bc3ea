import { z } from "zod";
import { EmbeddingServiceError, describeCause } from "../errors.js";
import { createLogger } from "../logger.js";
import type { EmbeddingVector } from "./types.js";

const logger = createLogger("embedding-service");

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number()),
    }),
  ),
});

export interface Embedder {
  readonly model: string;
  embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<EmbeddingVector[]>;
  embedQuery(query: string): Promise<EmbeddingVector>;
}

export interface EmbeddingServiceOptions {
  baseUrl: string;
  model: string;
  apiKey?: string | undefined;
  batchSize: number;
  concurrency: number;
  queryPrefix: string;
  timeoutMs: number;
}

/** Client for an OpenAI-compatible `/embeddings` endpoint. */
export class EmbeddingService implements Embedder {
  readonly model: string;

  constructor(private readonly options: EmbeddingServiceOptions) {
    this.model = options.model;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    return headers;
  }

  private async embedBatch(batch: string[]): Promise<EmbeddingVector[]> {
    let res: Response;
    try {
      res = await fetch(`${this.options.baseUrl}/embeddings`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({ model: this.options.model, input: batch }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err: unknown) {
      throw new EmbeddingServiceError(
        `Embedding service unreachable: ${describeCause(err)}`,
        undefined,
        err,
      );
    }

    if (!res.ok) {
      const text = await res.text();
      throw new EmbeddingServiceError(`Embedding API error (${res.status}): ${text}`, res.status);
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EmbeddingServiceError(`Embedding API returned an unexpected body: ${parsed.error.message}`);
    }
    const items = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    if (items.length !== batch.length) {
      throw new EmbeddingServiceError(
        `Embedding count mismatch: texts=${batch.length} embeddings=${items.length}`,
      );
    }
    return items.map((item) => item.embedding);
  }

  async embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<EmbeddingVector[]> {
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push({
        texts: texts.slice(i, i + this.options.batchSize),
        startIdx: i,
      });
    }

    const results: EmbeddingVector[] = new Array<EmbeddingVector>(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.options.concurrency, queue.length) },
      async () => {
        for (let batch = queue.shift(); batch; batch = queue.shift()) {
          const { startIdx } = batch;
          const embeddings = await this.embedBatch(batch.texts);
          embeddings.forEach((embedding, j) => {
            results[startIdx + j] = embedding;
          });
          completed += batch.texts.length;
          onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    logger.debug({ count: texts.length, batches: batches.length }, "Embedded texts");
    return results;
  }

  async embedQuery(query: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embedBatch([this.options.queryPrefix + query]);
    if (!embedding) {
      throw new EmbeddingServiceError("Embedding API returned no vector for the query");
    }
    return embedding;
  }

  /** True when the endpoint answers a one-word request. */
  async ping(): Promise<boolean> {
    try {
      await this.embedBatch(["ping"]);
      return true;
    } catch {
      return false;
    }
  }
}
