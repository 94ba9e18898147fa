export type { IStoryTable } from "./story-table.interface.js";
export { STORY_TABLE_SCHEMA, STORY_TABLE_COLUMNS } from "./schema.js";
export { LanceDbStoryTable, openOrCreateTable } from "./lancedb-adapter.js";
export type { OpenedTable } from "./lancedb-adapter.js";
