import { connect, type Connection, type Table } from "@lancedb/lancedb";
import type { Schema } from "apache-arrow";
import type { StoryRecord } from "@storyvault/types";
import { createSilentLogger, type Logger } from "@storyvault/logger";
import type { IStoryTable } from "./story-table.interface.js";
import { STORY_TABLE_SCHEMA } from "./schema.js";

export interface OpenedTable {
  table: Table;
  created: boolean;
}

/**
 * Open `name` if it exists, keeping whatever schema it already has;
 * otherwise create it empty with `schema`.
 */
export async function openOrCreateTable(
  db: Connection,
  name: string,
  schema: Schema,
): Promise<OpenedTable> {
  const existing = await db.tableNames();
  if (existing.includes(name)) {
    return { table: await db.openTable(name), created: false };
  }
  return { table: await db.createEmptyTable(name, schema), created: true };
}

function toRow(record: StoryRecord): Record<string, unknown> {
  return {
    story_id: record.story_id,
    story_desc_vector: record.story_desc_vector,
    file_name: record.file_name,
    processed_flags: record.processed_flags,
    timestamp: record.timestamp,
    test_cases: record.test_cases,
  };
}

export class LanceDbStoryTable implements IStoryTable {
  readonly name: string;
  private readonly db: Connection;
  private readonly table: Table;
  private readonly logger: Logger;

  private constructor(name: string, db: Connection, table: Table, logger: Logger) {
    this.name = name;
    this.db = db;
    this.table = table;
    this.logger = logger;
  }

  /**
   * Connect to the database directory at `uri` and open or create the story table.
   * Connection and table errors propagate; they are fatal to a run.
   */
  static async connect(
    uri: string,
    tableName: string,
    logger: Logger = createSilentLogger(),
  ): Promise<LanceDbStoryTable> {
    const db = await connect(uri);
    const { table, created } = await openOrCreateTable(db, tableName, STORY_TABLE_SCHEMA);
    logger.info({ uri, table: tableName, created }, created ? "table created" : "table opened");
    return new LanceDbStoryTable(tableName, db, table, logger);
  }

  async append(records: StoryRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }
    await this.table.add(records.map(toRow));
    this.logger.debug({ table: this.name, count: records.length }, "records appended");
    return records.length;
  }

  async countRows(): Promise<number> {
    return this.table.countRows();
  }

  async version(): Promise<number> {
    return this.table.version();
  }

  async schema(): Promise<Schema> {
    return this.table.schema();
  }

  async close(): Promise<void> {
    this.table.close();
    this.db.close();
  }
}
