import type { ExtractResult } from "@storyvault/types";
import { ExtractionError } from "@storyvault/errors";
import type { IExtractor } from "./extractor.interface.js";
import { readSource, toExtractResult } from "./source.js";

/**
 * Plain text extractor. The whole file must be valid UTF-8; a leading byte
 * order mark is kept as U+FEFF.
 */
export class TextExtractor implements IExtractor {
  readonly fileType = "txt" as const;

  async extract(filePath: string): Promise<ExtractResult> {
    const bytes = await readSource(filePath);

    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (err) {
      throw new ExtractionError(`'${filePath}' is not valid UTF-8 text.`, filePath, {
        cause: err,
      });
    }

    return toExtractResult(text, undefined, { encoding: "utf-8" });
  }
}
