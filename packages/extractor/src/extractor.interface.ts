import type { ExtractResult, SupportedFileType } from "@storyvault/types";

export interface IExtractor {
  readonly fileType: SupportedFileType;
  extract(filePath: string): Promise<ExtractResult>;
}

export type ExtractorRegistry = Readonly<Record<SupportedFileType, IExtractor>>;
