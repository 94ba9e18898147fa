export type FileType = "pdf" | "docx" | "txt" | "unknown";

export type SupportedFileType = Exclude<FileType, "unknown">;

export type ProcessedFlag = "NO" | "YES";

/**
 * One row of the story table. Column names match the persisted schema.
 */
export interface StoryRecord {
  story_id: string;
  story_desc_vector: number[];
  file_name: string;
  /** Always "NO" on insertion; a downstream consumer flips it. */
  processed_flags: ProcessedFlag;
  timestamp: string;
  /** Filled in later by test-case generation; empty on insertion. */
  test_cases: number[];
}

export interface StoryRecordInput {
  storyId: string;
  vector: readonly number[];
  fileName: string;
  timestamp: string;
}
