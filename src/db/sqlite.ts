/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import pLimit from "p-limit";

import {
  isRow,
  type DatabaseBackend,
  type DatabaseExecutor,
  type Row,
  type SqlParam,
} from "./backend.js";
import { schemaSql } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  private db: Database.Database;
  // better-sqlite3 has one connection; BEGIN must not nest across callers.
  private writer = pLimit(1);

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(schemaSql(this.dialect));
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async query(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    return this.db.prepare(sql).all(...params).filter(isRow);
  }

  async queryOne(sql: string, params: SqlParam[] = []): Promise<Row | null> {
    const row: unknown = this.db.prepare(sql).get(...params);
    return isRow(row) ? row : null;
  }

  async transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T>): Promise<T> {
    return this.writer(async () => {
      this.db.exec("BEGIN IMMEDIATE");
      try {
        const result = await fn(this);
        this.db.exec("COMMIT");
        return result;
      } catch (err) {
        this.db.exec("ROLLBACK");
        throw err;
      }
    });
  }

  async close(): Promise<void> {
    await this.writer(async () => {
      this.db.close();
    });
  }
}
