import path from "node:path";
import type { ExtractResult, FileType, SupportedFileType } from "@storyvault/types";
import { EmptyContentError, UnsupportedFileTypeError } from "@storyvault/errors";
import type { ExtractorRegistry, IExtractor } from "./extractor.interface.js";
import { PdfExtractor } from "./pdf-extractor.js";
import { DocxExtractor } from "./docx-extractor.js";
import { TextExtractor } from "./text-extractor.js";

const EXTENSION_TO_TYPE: Readonly<Record<string, SupportedFileType>> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".txt": "txt",
};

export const DEFAULT_EXTRACTORS: ExtractorRegistry = {
  pdf: new PdfExtractor(),
  docx: new DocxExtractor(),
  txt: new TextExtractor(),
};

/**
 * Classify a file by its extension (case-insensitive).
 */
export function getFileType(filePath: string): FileType {
  return EXTENSION_TO_TYPE[path.extname(filePath).toLowerCase()] ?? "unknown";
}

/**
 * Look up the extraction strategy for a file type. `unknown` has none.
 */
export function getExtractor(
  fileType: FileType,
  registry: ExtractorRegistry = DEFAULT_EXTRACTORS,
): IExtractor | undefined {
  return fileType === "unknown" ? undefined : registry[fileType];
}

/**
 * Classify, dispatch and extract. The returned text is never blank.
 *
 * @throws UnsupportedFileTypeError before the file is opened, for unknown types
 * @throws ExtractionError when the strategy cannot read the file
 * @throws EmptyContentError when the text is blank after trimming
 */
export async function extractText(
  filePath: string,
  registry: ExtractorRegistry = DEFAULT_EXTRACTORS,
): Promise<ExtractResult> {
  const fileType = getFileType(filePath);
  const extractor = getExtractor(fileType, registry);
  if (!extractor) {
    throw new UnsupportedFileTypeError(path.basename(filePath), path.extname(filePath));
  }

  const result = await extractor.extract(filePath);
  if (result.text.trim().length === 0) {
    throw new EmptyContentError(filePath, { details: { fileType } });
  }

  return result;
}
