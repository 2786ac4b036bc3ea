import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BackupNotFoundError,
  DimensionMismatchError,
  EmbeddingModelMismatchError,
  IndexCorruptError,
} from "../../errors.js";
import { chunkText } from "../chunking/index.js";
import { FileIndexStore } from "../index-store.js";
import type { IndexMetadata } from "../types.js";
import { METADATA_FILE, VectorIndex, type EmbedPassages } from "../vector-store.js";
import { VocabularyEmbedder, makeTempDir, removeDir } from "./fakes.js";

let root: string;
let embedder: VocabularyEmbedder;

const greek = chunkText("alpha beta gamma delta epsilon zeta eta theta iota", "greek.pdf", 3);
const colours = chunkText("red orange yellow green blue indigo", "colours.pdf", 3);

function newIndex(embeddingModel = "fake-embed"): VectorIndex {
  return new VectorIndex({ store: new FileIndexStore(root), embeddingModel });
}

function embedWith(e: VocabularyEmbedder): EmbedPassages {
  return (passages) => e.embedTexts(passages.map((p) => p.text));
}

async function generations(): Promise<string[]> {
  return (await readdir(root)).filter((entry) => entry.startsWith("gen-"));
}

beforeEach(async () => {
  root = await makeTempDir("index");
  embedder = new VocabularyEmbedder();
});

afterEach(async () => {
  await removeDir(root);
});

describe("VectorIndex", () => {
  it("loads as an empty index when nothing is on disk", async () => {
    const index = newIndex();
    expect(index.isLoaded()).toBe(false);

    await index.load();

    expect(index.isLoaded()).toBe(true);
    expect(index.stats()).toEqual({
      loaded: true,
      passages: 0,
      dimension: 0,
      embeddingModel: null,
      documents: [],
    });
    expect(await index.search(embedder.embed("alpha"), 3)).toEqual([]);
  });

  it("returns a passage as its own nearest neighbour", async () => {
    const index = newIndex();
    const result = await index.buildOrAppend(greek, embedWith(embedder), "create");
    expect(result).toEqual({ added: 3, skipped: 0 });

    const hits = await index.search(embedder.embed("delta epsilon zeta"), 3);

    expect(hits[0]?.passage.id).toBe(greek[1]?.id);
    expect(hits[0]?.score).toBeCloseTo(1, 5);
    expect(hits.map((h) => h.score)).toEqual([...hits.map((h) => h.score)].sort((a, b) => b - a));
  });

  it("never returns more than the number of stored passages", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    expect(await index.search(embedder.embed("alpha"), 10)).toHaveLength(3);
    expect(await index.search(embedder.embed("alpha"), 0)).toEqual([]);
  });

  it("persists the index so a fresh instance can load it", async () => {
    await newIndex().buildOrAppend(greek, embedWith(embedder), "create");

    const reloaded = newIndex();
    await reloaded.load();
    const stats = reloaded.stats();

    expect(stats.passages).toBe(3);
    expect(stats.dimension).toBe(256);
    expect(stats.embeddingModel).toBe("fake-embed");
    expect(stats.documents).toHaveLength(1);
    expect(stats.documents[0]).toMatchObject({ source: "greek.pdf", passageCount: 3 });

    const [hit] = await reloaded.search(embedder.embed("eta theta iota"), 1);
    expect(hit?.passage).toEqual(greek[2]);
  });

  it("appends new passages and keeps the existing ones", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    const result = await index.buildOrAppend([...greek, ...colours], embedWith(embedder), "append");

    expect(result).toEqual({ added: 2, skipped: 3 });
    expect(index.stats().passages).toBe(5);
    expect(index.stats().documents.map((d) => d.source)).toEqual(["greek.pdf", "colours.pdf"]);

    const [oldHit] = await index.search(embedder.embed("alpha beta gamma"), 1);
    expect(oldHit?.passage.id).toBe(greek[0]?.id);
    const [newHit] = await index.search(embedder.embed("green blue indigo"), 1);
    expect(newHit?.passage.id).toBe(colours[1]?.id);
    expect(await generations()).toHaveLength(1);
  });

  it("loads the on-disk index before appending when nothing is loaded yet", async () => {
    await newIndex().buildOrAppend(greek, embedWith(embedder), "create");

    const index = newIndex();
    await index.buildOrAppend(colours, embedWith(embedder), "append");

    expect(index.stats().passages).toBe(5);
  });

  it("does not write a new generation when an append adds nothing", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");
    const pointer = await readFile(path.join(root, "CURRENT"), "utf-8");

    const result = await index.buildOrAppend(greek, embedWith(embedder), "append");

    expect(result).toEqual({ added: 0, skipped: 3 });
    expect(await readFile(path.join(root, "CURRENT"), "utf-8")).toBe(pointer);
  });

  it("replaces the whole index in create mode", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");
    await index.buildOrAppend(colours, embedWith(embedder), "create");

    expect(index.stats().passages).toBe(2);
    expect(index.stats().documents.map((d) => d.source)).toEqual(["colours.pdf"]);
  });

  it("rejects vectors of a different dimension and leaves the index untouched", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    const narrow = new VocabularyEmbedder("fake-embed", 32);
    await expect(index.buildOrAppend(colours, embedWith(narrow), "append")).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );

    expect(index.stats().passages).toBe(3);
    const reloaded = newIndex();
    await reloaded.load();
    expect(reloaded.stats().passages).toBe(3);
    expect(await generations()).toHaveLength(1);
  });

  it("leaves the index untouched when embedding fails", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    const failing: EmbedPassages = async () => {
      throw new Error("embedding service down");
    };
    await expect(index.buildOrAppend(colours, failing, "append")).rejects.toThrow("embedding service down");

    expect(index.stats().passages).toBe(3);
  });

  it("refuses to append vectors from a different embedding model", async () => {
    await newIndex("fake-embed").buildOrAppend(greek, embedWith(embedder), "create");

    const other = newIndex("other-embed");
    await expect(other.buildOrAppend(colours, embedWith(embedder), "append")).rejects.toBeInstanceOf(
      EmbeddingModelMismatchError,
    );

    await other.buildOrAppend(colours, embedWith(embedder), "create");
    expect(other.stats().embeddingModel).toBe("other-embed");
  });

  it("rejects a query vector of the wrong dimension", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    await expect(index.search([1, 0, 0], 3)).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("reports a corrupt metadata table on load", async () => {
    await newIndex().buildOrAppend(greek, embedWith(embedder), "create");
    const live = (await readFile(path.join(root, "CURRENT"), "utf-8")).trim();
    await writeFile(path.join(root, live, METADATA_FILE), "{not json", "utf-8");

    await expect(newIndex().load()).rejects.toBeInstanceOf(IndexCorruptError);
  });

  it("reports metadata that disagrees with the vector structure", async () => {
    await newIndex().buildOrAppend(greek, embedWith(embedder), "create");
    const live = (await readFile(path.join(root, "CURRENT"), "utf-8")).trim();
    const metadataPath = path.join(root, live, METADATA_FILE);
    const metadata: IndexMetadata = JSON.parse(await readFile(metadataPath, "utf-8"));
    await writeFile(metadataPath, JSON.stringify({ ...metadata, passages: greek.slice(0, 2) }), "utf-8");

    await expect(newIndex().load()).rejects.toThrow("vector structure holds 3 vectors but metadata holds 2 passages");
  });

  it("serializes concurrent writers", async () => {
    const index = newIndex();
    await index.load();

    await Promise.all([
      index.buildOrAppend(greek, embedWith(embedder), "append"),
      index.buildOrAppend(colours, embedWith(embedder), "append"),
    ]);

    expect(index.stats().passages).toBe(5);
    const reloaded = newIndex();
    await reloaded.load();
    expect(reloaded.stats().passages).toBe(5);
  });

  it("restores a backup over a later rebuild", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");
    await index.backup("greek-only");
    await index.buildOrAppend(colours, embedWith(embedder), "create");

    const result = await index.restore("greek-only");

    expect(result.restored).toBe("greek-only");
    expect(result.passages).toBe(3);
    expect(result.safetyBackup).toMatch(/^pre-restore-\d{8}-\d{6}-\d{3}$/);
    expect(index.stats().documents.map((d) => d.source)).toEqual(["greek.pdf"]);
    expect((await index.search(embedder.embed("alpha beta gamma"), 1))[0]?.passage.id).toBe(greek[0]?.id);
    expect((await index.listBackups()).map((b) => b.name).sort()).toEqual(
      ["greek-only", result.safetyBackup ?? ""].sort(),
    );

    const reopened = newIndex();
    await reopened.load();
    expect(reopened.stats().documents.map((d) => d.source)).toEqual(["greek.pdf"]);
    expect(await generations()).toHaveLength(1);
  });

  it("refuses to restore a backup that does not exist", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");

    await expect(index.restore("missing")).rejects.toBeInstanceOf(BackupNotFoundError);
    expect(index.stats().passages).toBe(3);
  });

  it("keeps the live index when the backup is corrupt", async () => {
    const index = newIndex();
    await index.buildOrAppend(greek, embedWith(embedder), "create");
    await index.backup("broken");
    await writeFile(path.join(root, "backups", "broken", METADATA_FILE), "{", "utf-8");
    const live = await generations();

    await expect(index.restore("broken")).rejects.toBeInstanceOf(IndexCorruptError);

    expect(await generations()).toEqual(live);
    expect(index.stats().documents.map((d) => d.source)).toEqual(["greek.pdf"]);
  });
});
