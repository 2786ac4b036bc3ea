import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { DocumentReadError } from "../errors.js";
import type { ExtractedDocument, PageContent } from "./types.js";

export async function extractPdf(filePath: string): Promise<ExtractedDocument> {
  const pages: PageContent[] = [];
  try {
    const buffer = await readFile(filePath);
    const pdf = await getDocumentProxy(new Uint8Array(buffer));

    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();
        const text = textContent.items
          .map((item) => ("str" in item ? item.str : ""))
          .join(" ");
        pages.push({ pageNumber: i, text });
      }
    } finally {
      await pdf.destroy();
    }
  } catch (err: unknown) {
    throw new DocumentReadError(filePath, err);
  }

  return {
    source: path.basename(filePath),
    filePath: path.resolve(filePath),
    pages,
  };
}
