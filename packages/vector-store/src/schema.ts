import { Field, Float32, List, Schema, Utf8 } from "apache-arrow";

function float32List(): List<Float32> {
  return new List(new Field("item", new Float32(), true));
}

/**
 * Fixed columnar schema of the story table. Created once, never migrated.
 */
export const STORY_TABLE_SCHEMA = new Schema([
  new Field("story_id", new Utf8(), true),
  new Field("story_desc_vector", float32List(), true),
  new Field("file_name", new Utf8(), true),
  new Field("processed_flags", new Utf8(), true),
  new Field("timestamp", new Utf8(), true),
  new Field("test_cases", float32List(), true),
]);

export const STORY_TABLE_COLUMNS = STORY_TABLE_SCHEMA.fields.map((field) => field.name);
