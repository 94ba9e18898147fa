import type { StoryRecord, StoryRecordInput } from "@storyvault/types";

export function buildStoryRecord({
  storyId,
  vector,
  fileName,
  timestamp,
}: StoryRecordInput): StoryRecord {
  return {
    story_id: storyId,
    story_desc_vector: [...vector],
    file_name: fileName,
    processed_flags: "NO",
    timestamp,
    test_cases: [],
  };
}
