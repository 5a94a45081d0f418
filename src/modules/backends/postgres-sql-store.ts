import { BackendUnavailableError, errorMessage } from "../../errors.js";
import { logWarn, serializeError, type LogFn } from "../../observability/logger.js";
import type { SqlStore } from "../retrieval/types.js";

export interface PgQueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
  release(error?: Error | boolean): void;
}

export interface PgConnectionPool {
  connect(): Promise<PgQueryClient>;
}

export interface PostgresSqlStoreOptions {
  statementTimeoutMs: number;
  maxRows: number;
}

const SCHEMA_QUERY = [
  "SELECT table_name, column_name, data_type",
  "FROM information_schema.columns",
  "WHERE table_schema = 'public' AND table_name = ANY($1)",
  "ORDER BY table_name, ordinal_position"
].join("\n");

const formatValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return "NULL";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
};

export const renderRows = (rows: readonly Record<string, unknown>[]): string =>
  rows
    .map((row) =>
      Object.entries(row)
        .map(([column, value]) => `${column}=${formatValue(value)}`)
        .join(" | ")
    )
    .join("\n");

export const renderSchema = (rows: readonly Record<string, unknown>[]): string => {
  const columnsByTable = new Map<string, string[]>();
  for (const row of rows) {
    const table = formatValue(row.table_name);
    const columns = columnsByTable.get(table) ?? [];
    columns.push(`${formatValue(row.column_name)} (${formatValue(row.data_type)})`);
    columnsByTable.set(table, columns);
  }
  return [...columnsByTable.entries()]
    .map(([table, columns]) => [`Table ${table}:`, ...columns.map((column) => `  - ${column}`)].join("\n"))
    .join("\n\n");
};

/**
 * Runs statements inside a read-only transaction with a statement timeout. The transaction
 * is always rolled back.
 */
export class PostgresSqlStore implements SqlStore {
  private readonly logWarn: LogFn;

  constructor(
    private readonly pool: PgConnectionPool,
    private readonly options: PostgresSqlStoreOptions,
    dependencies: { logWarn?: LogFn } = {}
  ) {
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  private async withReadOnlyTransaction<T>(operation: (client: PgQueryClient) => Promise<T>): Promise<T> {
    let client: PgQueryClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new BackendUnavailableError(`Postgres connection failed: ${errorMessage(error)}`, { cause: error });
    }

    let releaseError: Error | undefined;
    try {
      await client.query("BEGIN TRANSACTION READ ONLY");
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(this.options.statementTimeoutMs))}`);
      return await operation(client);
    } finally {
      try {
        await client.query("ROLLBACK");
      } catch (error) {
        this.logWarn("postgres.rollback_failed", {}, serializeError(error));
        releaseError = error instanceof Error ? error : new Error(errorMessage(error));
      }
      client.release(releaseError);
    }
  }

  async describeSchema(tables: readonly string[]): Promise<string> {
    const rows = await this.withReadOnlyTransaction(async (client) => {
      const result = await client.query(SCHEMA_QUERY, [[...tables]]);
      return result.rows;
    });
    return renderSchema(rows);
  }

  async run(sql: string): Promise<string> {
    const rows = await this.withReadOnlyTransaction(async (client) => {
      const result = await client.query(sql);
      return result.rows;
    });
    return renderRows(rows.slice(0, this.options.maxRows));
  }
}
