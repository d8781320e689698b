/**
 * PostgreSQL database backend using postgres-js.
 *
 * Optional backend: `postgres` is in optionalDependencies and is
 * loaded on first connect.
 */
import type postgres from "postgres";

import type { DatabaseBackend, DatabaseExecutor, Row, SqlParam } from "./backend.js";
import { UnsupportedBackendError } from "../core/exceptions.js";
import { schemaSql } from "./schema.js";

type PostgresFactory = typeof postgres;
type PgSql = ReturnType<PostgresFactory>;
type Unsafe = (sql: string, params: SqlParam[]) => Promise<Row[]>;

/** Rewrite `?` placeholders to `$1, $2, ...`. */
export function toPositional(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

function executor(unsafe: Unsafe): DatabaseExecutor {
  return {
    async execute(sql, params = []) {
      await unsafe(sql, params);
    },
    async query(sql, params = []) {
      return unsafe(sql, params);
    },
    async queryOne(sql, params = []) {
      const rows = await unsafe(sql, params);
      return rows[0] ?? null;
    },
  };
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private sql: PgSql;
  private root: DatabaseExecutor;

  private constructor(sql: PgSql) {
    this.sql = sql;
    this.root = executor(async (query, params) => {
      const rows = await sql.unsafe(toPositional(query), params);
      return [...rows];
    });
  }

  static async connect(connectionString: string): Promise<PostgresBackend> {
    let factory: PostgresFactory;
    try {
      ({ default: factory } = await import("postgres"));
    } catch {
      throw new UnsupportedBackendError(
        "postgres package is required for PostgresBackend. Install with: npm install postgres",
      );
    }
    return new PostgresBackend(factory(connectionString));
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(schemaSql(this.dialect));
  }

  execute(sql: string, params?: SqlParam[]): Promise<void> {
    return this.root.execute(sql, params);
  }

  query(sql: string, params?: SqlParam[]): Promise<Row[]> {
    return this.root.query(sql, params);
  }

  queryOne(sql: string, params?: SqlParam[]): Promise<Row | null> {
    return this.root.queryOne(sql, params);
  }

  async transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T>): Promise<T> {
    const conn = await this.sql.reserve();
    const tx = executor(async (query, params) => {
      const rows = await conn.unsafe(toPositional(query), params);
      return [...rows];
    });
    try {
      await conn.unsafe("BEGIN");
      try {
        const result = await fn(tx);
        await conn.unsafe("COMMIT");
        return result;
      } catch (err) {
        await conn.unsafe("ROLLBACK");
        throw err;
      }
    } finally {
      conn.release();
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
