/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders, no ORM.
 */

export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

export type SqlDialect = "sqlite" | "postgres";

/** Statement surface shared by a backend and an open transaction. */
export interface DatabaseExecutor {
  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query(sql: string, params?: SqlParam[]): Promise<Row[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne(sql: string, params?: SqlParam[]): Promise<Row | null>;
}

export interface DatabaseBackend extends DatabaseExecutor {
  readonly dialect: SqlDialect;

  /** Create tables / indexes. */
  initialize(): Promise<void>;

  /**
   * Execute `fn` inside a transaction. Transactions never interleave:
   * a second caller waits until the first has committed or rolled back.
   */
  transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
