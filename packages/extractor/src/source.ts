import { readFile } from "node:fs/promises";
import type { ExtractResult } from "@storyvault/types";
import { ExtractionError } from "@storyvault/errors";

const CHARS_PER_PAGE = 3000;

/**
 * Read the raw bytes of a document. Any I/O failure is reported as an
 * ExtractionError so the pipeline treats unreadable files like unparsable ones.
 */
export async function readSource(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new ExtractionError(`Cannot read '${filePath}'`, filePath, { cause: err });
  }
}

export function toExtractResult(
  text: string,
  pageCount: number | undefined,
  metadata: Record<string, unknown> = {},
): ExtractResult {
  // Formats without real pages get an estimate (roughly 3000 chars per page)
  const pages = pageCount ?? Math.max(1, Math.ceil(text.length / CHARS_PER_PAGE));

  return {
    text,
    pageCount: pages,
    metadata: {
      ...metadata,
      charCount: text.length,
      wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
    },
  };
}
