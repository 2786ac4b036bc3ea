import { cp, mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import path from "node:path";
import { z } from "zod";
import { BackupNotFoundError, IndexError } from "../errors.js";
import { createLogger } from "../logger.js";

const logger = createLogger("index-store");

const CURRENT_FILE = "CURRENT";
const GENERATION_PREFIX = "gen-";
const BACKUPS_DIR = "backups";
export const BACKUP_INFO_FILE = "backup.json";
const BACKUP_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const backupInfoSchema = z.object({
  name: z.string(),
  createdAt: z.string(),
  generation: z.string(),
});

/** `createdAt` and `generation` are null when the backup carries no readable info file. */
export interface BackupRecord {
  name: string;
  createdAt: string | null;
  generation: string | null;
}

/** Sortable UTC timestamp for default backup names, e.g. `20261019-080503-042`. */
export function backupStamp(date: Date = new Date()): string {
  return date
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "-")
    .replace(".", "-")
    .replace("Z", "");
}

function assertBackupName(name: string): void {
  if (!BACKUP_NAME.test(name)) {
    throw new IndexError(
      `Invalid backup name "${name}": use letters, digits, ".", "_" and "-", starting with a letter or digit`,
    );
  }
}

export interface StagedGeneration {
  readonly name: string;
  readonly dir: string;
}

/**
 * The persisted index as one logical resource: the vector structure and the
 * metadata table live together in a generation directory, and a `CURRENT`
 * pointer names the live generation. Writers stage a new generation and
 * swap the pointer; readers only ever follow the pointer.
 */
export interface IndexStore {
  current(): Promise<string | null>;
  stage(seedFrom?: string): Promise<StagedGeneration>;
  swap(staged: StagedGeneration): Promise<void>;
  discard(staged: StagedGeneration): Promise<void>;
  /** Copies the live generation under `name`. Backups are never pruned. */
  backup(name: string): Promise<BackupRecord>;
  listBackups(): Promise<BackupRecord[]>;
  /** Directory holding backup `name`, suitable as a `stage` seed. */
  backupPath(name: string): Promise<string>;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (err: unknown) {
    if (isMissing(err)) return false;
    throw err;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export class FileIndexStore implements IndexStore {
  constructor(readonly rootDir: string) {}

  private pointerPath(): string {
    return path.join(this.rootDir, CURRENT_FILE);
  }

  private backupsDir(): string {
    return path.join(this.rootDir, BACKUPS_DIR);
  }

  async current(): Promise<string | null> {
    let name: string;
    try {
      name = (await readFile(this.pointerPath(), "utf-8")).trim();
    } catch (err: unknown) {
      if (isMissing(err)) return null;
      throw err;
    }
    return name ? path.join(this.rootDir, name) : null;
  }

  async stage(seedFrom?: string): Promise<StagedGeneration> {
    await mkdir(this.rootDir, { recursive: true });
    const name = `${GENERATION_PREFIX}${Date.now()}-${randomBytes(4).toString("hex")}`;
    const dir = path.join(this.rootDir, name);
    if (seedFrom) {
      await cp(seedFrom, dir, { recursive: true });
    } else {
      await mkdir(dir);
    }
    return { name, dir };
  }

  async swap(staged: StagedGeneration): Promise<void> {
    const tmpPointer = `${this.pointerPath()}.${randomBytes(4).toString("hex")}.tmp`;
    await writeFile(tmpPointer, staged.name, "utf-8");
    // rename(2) replaces the pointer atomically
    await rename(tmpPointer, this.pointerPath());
    logger.debug({ generation: staged.name }, "Swapped index generation");
    try {
      await this.prune(staged.name);
    } catch (err: unknown) {
      // The swap already happened; stale generations are retried on the next prune
      logger.warn({ err, generation: staged.name }, "Failed to prune old index generations");
    }
  }

  async discard(staged: StagedGeneration): Promise<void> {
    await rm(staged.dir, { recursive: true, force: true });
  }

  async backup(name: string): Promise<BackupRecord> {
    assertBackupName(name);
    const live = await this.current();
    if (!live) {
      throw new IndexError("There is no index to back up");
    }
    const dir = path.join(this.backupsDir(), name);
    if (await exists(dir)) {
      throw new IndexError(`Backup "${name}" already exists`);
    }

    await mkdir(this.backupsDir(), { recursive: true });
    await cp(live, dir, { recursive: true });
    const record = { name, createdAt: new Date().toISOString(), generation: path.basename(live) };
    await writeFile(path.join(dir, BACKUP_INFO_FILE), JSON.stringify(record, null, 2), "utf-8");
    logger.info({ backup: name, generation: record.generation }, "Backed up index");
    return record;
  }

  async listBackups(): Promise<BackupRecord[]> {
    let entries;
    try {
      entries = await readdir(this.backupsDir(), { withFileTypes: true });
    } catch (err: unknown) {
      if (isMissing(err)) return [];
      throw err;
    }
    const names = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    return Promise.all(names.map((name) => this.readBackupInfo(name)));
  }

  async backupPath(name: string): Promise<string> {
    assertBackupName(name);
    const dir = path.join(this.backupsDir(), name);
    if (!(await exists(dir))) {
      throw new BackupNotFoundError(name);
    }
    return dir;
  }

  private async readBackupInfo(name: string): Promise<BackupRecord> {
    const file = path.join(this.backupsDir(), name, BACKUP_INFO_FILE);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (err: unknown) {
      if (isMissing(err)) return { name, createdAt: null, generation: null };
      throw err;
    }
    const parsed = backupInfoSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      logger.warn({ backup: name }, "Backup info file is unreadable");
      return { name, createdAt: null, generation: null };
    }
    return { name, createdAt: parsed.data.createdAt, generation: parsed.data.generation };
  }

  /** Removes every generation except the live one, including leftovers from interrupted writes. */
  private async prune(keep: string): Promise<void> {
    const entries = await readdir(this.rootDir);
    for (const entry of entries) {
      const staleGeneration = entry.startsWith(GENERATION_PREFIX) && entry !== keep;
      const stalePointer = entry.startsWith(`${CURRENT_FILE}.`) && entry.endsWith(".tmp");
      if (staleGeneration || stalePointer) {
        await rm(path.join(this.rootDir, entry), { recursive: true, force: true });
      }
    }
  }
}
