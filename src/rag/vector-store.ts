import { readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { LocalIndex } from "vectra";
import { z } from "zod";
import {
  DimensionMismatchError,
  EmbeddingModelMismatchError,
  IndexCorruptError,
  IndexError,
  describeCause,
} from "../errors.js";
import { createLogger } from "../logger.js";
import { BACKUP_INFO_FILE, backupStamp, type BackupRecord, type IndexStore } from "./index-store.js";
import type {
  DocumentRecord,
  EmbeddingVector,
  IndexMetadata,
  IngestMode,
  Passage,
  RetrievalResult,
} from "./types.js";

const logger = createLogger("vector-store");

export const METADATA_FILE = "passages.json";

const metadataSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string(),
  dimension: z.number().int().nonnegative(),
  passages: z.array(
    z.object({
      id: z.string().min(1),
      text: z.string(),
      sourceDocument: z.string(),
      sequenceIndex: z.number().int().nonnegative(),
    }),
  ),
  documents: z.array(
    z.object({
      source: z.string(),
      passageCount: z.number().int().nonnegative(),
      ingestedAt: z.string(),
    }),
  ),
});

export type EmbedPassages = (passages: readonly Passage[]) => Promise<EmbeddingVector[]>;

export interface BuildResult {
  added: number;
  skipped: number;
}

export interface IndexStats {
  loaded: boolean;
  passages: number;
  dimension: number;
  embeddingModel: string | null;
  documents: DocumentRecord[];
}

/** One loaded generation. Never mutated; writers replace it wholesale. */
interface Snapshot {
  dir: string | null;
  metadata: IndexMetadata;
  passages: Map<string, Passage>;
  searchIndex: LocalIndex | null;
}

function emptySnapshot(embeddingModel: string): Snapshot {
  return {
    dir: null,
    metadata: { version: 1, embeddingModel, dimension: 0, passages: [], documents: [] },
    passages: new Map(),
    searchIndex: null,
  };
}

async function readGeneration(dir: string): Promise<Snapshot> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path.join(dir, METADATA_FILE), "utf-8"));
  } catch (err: unknown) {
    throw new IndexCorruptError(`cannot read ${METADATA_FILE}: ${describeCause(err)}`, err);
  }
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IndexCorruptError(`${METADATA_FILE} is invalid: ${parsed.error.message}`);
  }
  const metadata: IndexMetadata = parsed.data;

  const searchIndex = new LocalIndex(dir);
  if (!(await searchIndex.isIndexCreated())) {
    throw new IndexCorruptError("vector structure is missing");
  }

  // Loads the vectors into memory, so later searches never touch the directory
  let items: Awaited<ReturnType<LocalIndex["listItems"]>>;
  try {
    items = await searchIndex.listItems();
  } catch (err: unknown) {
    throw new IndexCorruptError(`cannot read vector structure: ${describeCause(err)}`, err);
  }

  const passages = new Map(metadata.passages.map((p) => [p.id, p]));
  if (passages.size !== metadata.passages.length) {
    throw new IndexCorruptError("duplicate passage ids in metadata");
  }
  if (items.length !== passages.size) {
    throw new IndexCorruptError(
      `vector structure holds ${items.length} vectors but metadata holds ${passages.size} passages`,
    );
  }
  for (const item of items) {
    if (!passages.has(item.id)) {
      throw new IndexCorruptError(`vector ${item.id} has no metadata entry`);
    }
    if (item.vector.length !== metadata.dimension) {
      throw new IndexCorruptError(
        `vector ${item.id} has dimension ${item.vector.length}, expected ${metadata.dimension}`,
      );
    }
  }

  return { dir, metadata, passages, searchIndex };
}

function mergeDocuments(
  existing: DocumentRecord[],
  added: readonly Passage[],
  ingestedAt: string,
): DocumentRecord[] {
  const bySource = new Map(existing.map((d) => [d.source, { ...d }]));
  for (const passage of added) {
    const record = bySource.get(passage.sourceDocument);
    if (record) {
      record.passageCount++;
      record.ingestedAt = ingestedAt;
    } else {
      bySource.set(passage.sourceDocument, {
        source: passage.sourceDocument,
        passageCount: 1,
        ingestedAt,
      });
    }
  }
  return [...bySource.values()];
}

export interface RestoreResult {
  restored: string;
  /** Backup taken of the index that was live before the restore, if there was one. */
  safetyBackup: string | null;
  passages: number;
}

export interface VectorIndexOptions {
  store: IndexStore;
  /** Model that produces the vectors written through this instance. */
  embeddingModel: string;
}

/**
 * Owns the persisted index. Writes are serialized and go through a staged
 * generation that is swapped in only once it has been written and re-read;
 * searches run against the last fully loaded snapshot.
 */
export class VectorIndex {
  private snapshot: Snapshot | null = null;
  private writeQueue: Promise<unknown> = Promise.resolve();
  private readonly store: IndexStore;
  readonly embeddingModel: string;

  constructor(options: VectorIndexOptions) {
    this.store = options.store;
    this.embeddingModel = options.embeddingModel;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    // The queue only orders tasks; each caller still sees its own failure through `run`
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  async load(): Promise<void> {
    await this.exclusive(() => this.loadCurrent());
  }

  private async loadCurrent(): Promise<Snapshot> {
    const dir = await this.store.current();
    const snapshot = dir ? await readGeneration(dir) : emptySnapshot(this.embeddingModel);
    this.snapshot = snapshot;
    logger.info(
      { passages: snapshot.passages.size, documents: snapshot.metadata.documents.length },
      dir ? "Index loaded" : "No index on disk, starting empty",
    );
    return snapshot;
  }

  /** Model the loaded index was built with, or null when it holds no passages. */
  indexModel(): string | null {
    const snapshot = this.snapshot;
    if (!snapshot || snapshot.passages.size === 0) return null;
    return snapshot.metadata.embeddingModel;
  }

  buildOrAppend(
    passages: readonly Passage[],
    embed: EmbedPassages,
    mode: IngestMode,
  ): Promise<BuildResult> {
    return this.exclusive(async () => {
      const base =
        mode === "append" ? (this.snapshot ?? (await this.loadCurrent())) : emptySnapshot(this.embeddingModel);

      if (base.passages.size > 0 && base.metadata.embeddingModel !== this.embeddingModel) {
        throw new EmbeddingModelMismatchError(base.metadata.embeddingModel, this.embeddingModel);
      }

      const seen = new Set(base.passages.keys());
      const fresh: Passage[] = [];
      for (const passage of passages) {
        if (seen.has(passage.id)) continue;
        seen.add(passage.id);
        fresh.push(passage);
      }
      const skipped = passages.length - fresh.length;

      if (mode === "append" && fresh.length === 0) {
        logger.info({ skipped }, "Nothing new to append");
        return { added: 0, skipped };
      }

      const vectors = fresh.length > 0 ? await embed(fresh) : [];
      if (vectors.length !== fresh.length) {
        throw new IndexError(
          `Embedding count mismatch: passages=${fresh.length} vectors=${vectors.length}`,
        );
      }

      const dimension = base.passages.size > 0 ? base.metadata.dimension : (vectors[0]?.length ?? 0);
      if (fresh.length > 0 && dimension === 0) {
        throw new IndexError("Embedding service returned empty vectors");
      }
      for (const vector of vectors) {
        if (vector.length !== dimension) {
          throw new DimensionMismatchError(dimension, vector.length);
        }
      }

      const staged = await this.store.stage(base.dir ?? undefined);
      let next: Snapshot;
      try {
        const searchIndex = new LocalIndex(staged.dir);
        if (!base.dir) {
          await searchIndex.createIndex();
        }
        await searchIndex.beginUpdate();
        for (let i = 0; i < fresh.length; i++) {
          const passage = fresh[i];
          const vector = vectors[i];
          if (!passage || !vector) continue;
          await searchIndex.insertItem({
            id: passage.id,
            vector,
            metadata: { source: passage.sourceDocument },
          });
        }
        await searchIndex.endUpdate();

        const metadata: IndexMetadata = {
          version: 1,
          embeddingModel: this.embeddingModel,
          dimension,
          passages: [...base.metadata.passages, ...fresh],
          documents: mergeDocuments(base.metadata.documents, fresh, new Date().toISOString()),
        };
        await writeFile(path.join(staged.dir, METADATA_FILE), JSON.stringify(metadata), "utf-8");

        next = await readGeneration(staged.dir);
      } catch (err: unknown) {
        await this.store.discard(staged);
        throw err;
      }

      await this.store.swap(staged);
      this.snapshot = next;
      logger.info(
        { mode, added: fresh.length, skipped, total: next.passages.size },
        "Index updated",
      );
      return { added: fresh.length, skipped };
    });
  }

  backup(name: string = `backup-${backupStamp()}`): Promise<BackupRecord> {
    return this.exclusive(() => this.store.backup(name));
  }

  listBackups(): Promise<BackupRecord[]> {
    return this.store.listBackups();
  }

  /**
   * Makes backup `name` the live index. The current index is backed up first,
   * and the restored copy is validated before the swap.
   */
  restore(name: string): Promise<RestoreResult> {
    return this.exclusive(async () => {
      const source = await this.store.backupPath(name);
      const safetyBackup = (await this.store.current())
        ? (await this.store.backup(`pre-restore-${backupStamp()}`)).name
        : null;

      const staged = await this.store.stage(source);
      let next: Snapshot;
      try {
        await rm(path.join(staged.dir, BACKUP_INFO_FILE), { force: true });
        next = await readGeneration(staged.dir);
      } catch (err: unknown) {
        await this.store.discard(staged);
        throw err;
      }

      await this.store.swap(staged);
      this.snapshot = next;
      logger.info({ backup: name, safetyBackup, passages: next.passages.size }, "Index restored");
      return { restored: name, safetyBackup, passages: next.passages.size };
    });
  }

  /** Cosine-similarity nearest neighbours, best first. Empty when nothing is indexed. */
  async search(queryVector: EmbeddingVector, k: number): Promise<RetrievalResult> {
    const snapshot = this.snapshot;
    if (!snapshot?.searchIndex || snapshot.passages.size === 0 || k < 1) return [];

    if (queryVector.length !== snapshot.metadata.dimension) {
      throw new DimensionMismatchError(snapshot.metadata.dimension, queryVector.length);
    }

    const results = await snapshot.searchIndex.queryItems(
      queryVector,
      Math.min(k, snapshot.passages.size),
    );
    return results
      .flatMap((r) => {
        const passage = snapshot.passages.get(r.item.id);
        return passage ? [{ passage, score: r.score }] : [];
      })
      .sort((a, b) => b.score - a.score);
  }

  stats(): IndexStats {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return { loaded: false, passages: 0, dimension: 0, embeddingModel: null, documents: [] };
    }
    return {
      loaded: true,
      passages: snapshot.passages.size,
      dimension: snapshot.metadata.dimension,
      embeddingModel: snapshot.passages.size > 0 ? snapshot.metadata.embeddingModel : null,
      documents: snapshot.metadata.documents,
    };
  }
}
