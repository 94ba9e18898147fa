import { getDocument, VerbosityLevel } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractResult } from "@storyvault/types";
import { ExtractionError } from "@storyvault/errors";
import type { IExtractor } from "./extractor.interface.js";
import { readSource, toExtractResult } from "./source.js";

/**
 * PDF extractor backed by the pdf.js legacy build (the one meant for Node).
 * Page texts are concatenated in page order, one page per line block.
 */
export class PdfExtractor implements IExtractor {
  readonly fileType = "pdf" as const;

  async extract(filePath: string): Promise<ExtractResult> {
    const bytes = await readSource(filePath);

    const loadingTask = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      verbosity: VerbosityLevel.ERRORS,
    });

    try {
      const pdf = await loadingTask.promise.catch((err: unknown) => {
        throw new ExtractionError(`'${filePath}' is not a valid PDF file.`, filePath, {
          cause: err,
        });
      });

      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();

        let pageText = "";
        for (const item of content.items) {
          if ("str" in item) {
            pageText += item.hasEOL ? `${item.str}\n` : item.str;
          }
        }
        pages.push(pageText);
        page.cleanup();
      }

      return toExtractResult(pages.join("\n"), pdf.numPages);
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`Failed to read PDF content of '${filePath}'`, filePath, {
        cause: err,
      });
    } finally {
      await loadingTask.destroy();
    }
  }
}
