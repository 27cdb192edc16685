import { DuckDBInstance, DuckDBConnection, type DuckDBValue } from "@duckdb/node-api";
import * as fs from "fs/promises";
import * as path from "path";

export const TIER_SCHEMAS = ["bronze", "silver", "gold"] as const;
export type TierSchema = (typeof TIER_SCHEMAS)[number];

export type SqlParams = DuckDBValue[];

export interface DatabaseConfig {
  /** Database file, or ":memory:" for an in-process database. */
  path: string;
}

export interface TableInfo {
  table_schema: string;
  table_name: string;
  table_type: string;
}

export interface DatabaseInfo {
  path: string;
  tables: number;
  tableList: TableInfo[];
}

export interface ColumnInfo {
  column_name: string;
  data_type: string;
  is_nullable: string;
}

export interface ColumnProfile {
  column_name: string;
  data_type: string;
  null_count: number;
  distinct_count: number;
  min_value: string | null;
  max_value: string | null;
}

/** Column definition used both for DDL and for typed inserts. */
export interface ColumnDefinition {
  name: string;
  type: string;
  nullable?: boolean;
}

const INSERT_CHUNK_ROWS = 250;

/** Split "schema.table" into its parts; bare names live in `main`. */
export function splitTableName(name: string): { schema: string; table: string } {
  const dot = name.indexOf(".");
  if (dot === -1) return { schema: "main", table: name };
  return { schema: name.slice(0, dot), table: name.slice(dot + 1) };
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteTable(name: string): string {
  const { schema, table } = splitTableName(name);
  return `${quoteIdent(schema)}.${quoteIdent(table)}`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class DatabaseManager {
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;
  readonly path: string;

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.path = config.path ?? (process.env.DB_PATH || "./data/warehouse.duckdb");
  }

  async initialize(): Promise<void> {
    await this.getConnection();
  }

  private async getConnection(): Promise<DuckDBConnection> {
    if (this.connection) return this.connection;
    if (this.path !== ":memory:") {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
    }
    const instance = await DuckDBInstance.create(this.path);
    this.instance = instance;
    this.connection = await instance.connect();
    return this.connection;
  }

  async query<T = Record<string, unknown>>(sql: string, params?: SqlParams): Promise<T[]> {
    const conn = await this.getConnection();
    const reader = await conn.runAndReadAll(sql, params);
    return reader.getRowObjectsJson() as T[];
  }

  /** Same as query, untyped; callers decode each field themselves. */
  async rows(sql: string, params?: SqlParams): Promise<Record<string, unknown>[]> {
    const conn = await this.getConnection();
    const reader = await conn.runAndReadAll(sql, params);
    return reader.getRowObjectsJson();
  }

  async execute(sql: string, params?: SqlParams): Promise<void> {
    const conn = await this.getConnection();
    await conn.run(sql, params);
  }

  /** Run `fn` inside BEGIN/COMMIT; roll back and rethrow on failure. */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    await this.execute("BEGIN TRANSACTION");
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      // Keep the original failure; a rollback error becomes its cause.
      await this.execute("ROLLBACK").catch((rollbackErr: unknown) => {
        if (err instanceof Error && err.cause === undefined) err.cause = rollbackErr;
      });
      throw err;
    }
    await this.execute("COMMIT");
    return result;
  }

  /**
   * Multi-row parameterised INSERT. Every placeholder is cast to its column
   * type so plain JS numbers and ISO date strings land as DECIMAL/DATE.
   */
  async insertRows(table: string, columns: readonly ColumnDefinition[], rows: readonly SqlParams[]): Promise<number> {
    if (!rows.length) return 0;
    const columnList = columns.map((c) => quoteIdent(c.name)).join(", ");
    const tuple = "(" + columns.map((c) => `CAST(? AS ${c.type})`).join(", ") + ")";
    for (let start = 0; start < rows.length; start += INSERT_CHUNK_ROWS) {
      const chunk = rows.slice(start, start + INSERT_CHUNK_ROWS);
      const sql = `INSERT INTO ${quoteTable(table)} (${columnList}) VALUES ${chunk.map(() => tuple).join(", ")}`;
      await this.execute(sql, chunk.flat());
    }
    return rows.length;
  }

  /** Append every data row of a headered CSV file to an existing table, positionally. */
  async loadCSV(table: string, filePath: string): Promise<void> {
    await this.execute(
      `INSERT INTO ${quoteTable(table)} SELECT * FROM read_csv(${quoteLiteral(filePath)}, header = true, delim = ',', all_varchar = true)`
    );
  }

  async tableExists(name: string): Promise<boolean> {
    const { schema, table } = splitTableName(name);
    const rows = await this.query<{ cnt: number }>(
      `SELECT COUNT(*)::INTEGER AS cnt FROM information_schema.tables WHERE table_schema = ? AND table_name = ?`,
      [schema, table]
    );
    return (rows[0]?.cnt ?? 0) > 0;
  }

  async countRows(name: string): Promise<number> {
    const rows = await this.query<{ cnt: number }>(`SELECT COUNT(*)::INTEGER AS cnt FROM ${quoteTable(name)}`);
    return rows[0]?.cnt ?? 0;
  }

  async getInfo(): Promise<DatabaseInfo> {
    const tables = await this.query<TableInfo>(`
      SELECT table_schema, table_name, table_type
      FROM information_schema.tables
      WHERE table_schema IN ('main', 'bronze', 'silver', 'gold')
      ORDER BY table_schema, table_name
    `);
    return { path: this.path, tables: tables.length, tableList: tables };
  }

  async describeTable(name: string): Promise<ColumnInfo[]> {
    const { schema, table } = splitTableName(name);
    return this.query<ColumnInfo>(
      `SELECT column_name, data_type, is_nullable FROM information_schema.columns WHERE table_schema = ? AND table_name = ? ORDER BY ordinal_position`,
      [schema, table]
    );
  }

  async sampleTable(name: string, limit: number = 5): Promise<Record<string, unknown>[]> {
    return this.rows(`SELECT * FROM ${quoteTable(name)} LIMIT ${Math.max(1, Math.floor(limit))}`);
  }

  async profileTable(name: string): Promise<ColumnProfile[]> {
    const columns = await this.describeTable(name);
    if (!columns.length) throw new Error(`Table '${name}' not found or has no columns.`);

    const profiles: ColumnProfile[] = [];
    for (const col of columns) {
      const c = quoteIdent(col.column_name);
      const stats = await this.query<Omit<ColumnProfile, "column_name" | "data_type">>(
        `SELECT
           COUNT(*) FILTER (WHERE ${c} IS NULL)::INTEGER AS null_count,
           COUNT(DISTINCT ${c})::INTEGER AS distinct_count,
           MIN(${c})::VARCHAR AS min_value,
           MAX(${c})::VARCHAR AS max_value
         FROM ${quoteTable(name)}`
      );
      profiles.push({
        column_name: col.column_name,
        data_type: col.data_type,
        null_count: stats[0]?.null_count ?? 0,
        distinct_count: stats[0]?.distinct_count ?? 0,
        min_value: stats[0]?.min_value ?? null,
        max_value: stats[0]?.max_value ?? null,
      });
    }
    return profiles;
  }

  async close(): Promise<void> {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
  }
}
