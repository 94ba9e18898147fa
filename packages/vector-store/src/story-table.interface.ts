import type { StoryRecord } from "@storyvault/types";

export interface IStoryTable {
  readonly name: string;
  /**
   * Append a batch of records in one write. An empty batch writes nothing.
   * Resolves with the number of records written.
   */
  append(records: StoryRecord[]): Promise<number>;
  countRows(): Promise<number>;
  close(): Promise<void>;
}
