import JSZip from "jszip";
import mammoth from "mammoth";
import type { ExtractResult } from "@storyvault/types";
import { ExtractionError } from "@storyvault/errors";
import type { IExtractor } from "./extractor.interface.js";
import { readSource, toExtractResult } from "./source.js";

// mammoth terminates every paragraph with a blank line
const MAMMOTH_PARAGRAPH_END = "\n\n";

/**
 * Word (.docx) extractor. The container is checked with jszip first so a
 * renamed or truncated file fails with a clear message before mammoth runs.
 */
export class DocxExtractor implements IExtractor {
  readonly fileType = "docx" as const;

  async extract(filePath: string): Promise<ExtractResult> {
    const buffer = await readSource(filePath);

    try {
      await JSZip.loadAsync(buffer);
    } catch (err) {
      throw new ExtractionError(`'${filePath}' is not a valid DOCX file.`, filePath, {
        cause: err,
      });
    }

    let raw: string;
    let warnings: number;
    try {
      const result = await mammoth.extractRawText({ buffer });
      raw = result.value;
      warnings = result.messages.length;
    } catch (err) {
      throw new ExtractionError(`Failed to read DOCX content of '${filePath}'`, filePath, {
        cause: err,
      });
    }

    const paragraphs = splitParagraphs(raw);
    return toExtractResult(paragraphs.join("\n"), undefined, {
      paragraphCount: paragraphs.length,
      warnings,
    });
  }
}

function splitParagraphs(raw: string): string[] {
  const body = raw.endsWith(MAMMOTH_PARAGRAPH_END)
    ? raw.slice(0, -MAMMOTH_PARAGRAPH_END.length)
    : raw;
  return body.length === 0 ? [] : body.split(MAMMOTH_PARAGRAPH_END);
}
