export type { IExtractor, ExtractorRegistry } from "./extractor.interface.js";
export { TextExtractor } from "./text-extractor.js";
export { DocxExtractor } from "./docx-extractor.js";
export { PdfExtractor } from "./pdf-extractor.js";
export { getFileType, getExtractor, extractText, DEFAULT_EXTRACTORS } from "./factory.js";
