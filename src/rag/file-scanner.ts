import { readdir, stat } from "node:fs/promises";
import path from "node:path";

/** A single PDF path, or every PDF directly inside a directory (sorted by name). */
export async function listPdfFiles(target: string): Promise<string[]> {
  const targetStat = await stat(target);
  if (targetStat.isFile()) return [path.resolve(target)];

  const entries = await readdir(target);
  return entries
    .filter((f) => f.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((f) => path.resolve(target, f));
}
