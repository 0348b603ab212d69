/**
 * packages/db - Relational schema definition
 *
 * The CREATE TABLE statements external consumers expect, kept beside the
 * Drizzle tables in ./schema (the column sets must stay equal).
 * Identifiers are quoted: `timestamp`, `interval`, `open`, `close`, `count`
 * and `signal` are all SQL keywords.
 */

export interface ColumnDefinition {
  name: string;
  /** Everything after the column name, e.g. `REAL NOT NULL DEFAULT 0` */
  definition: string;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];
  /** Table-level constraints (foreign keys) */
  constraints: string[];
}

const col = (name: string, definition: string): ColumnDefinition => ({ name, definition });

const referencesAccount = `FOREIGN KEY ("account_id") REFERENCES "accounts" ("account_id")`;

/**
 * All tables, parents first.
 */
export const TABLE_DEFINITIONS: readonly TableDefinition[] = [
  {
    name: "accounts",
    columns: [
      col("account_id", "INTEGER PRIMARY KEY"),
      col("owner", "TEXT NOT NULL"),
      col("created_at", "TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP"),
      col("cash_balance", "REAL NOT NULL DEFAULT 0"),
      col("margin_requirement", "REAL NOT NULL DEFAULT 0"),
      col("margin_used", "REAL NOT NULL DEFAULT 0"),
      col("last_update", "TIMESTAMP"),
    ],
    constraints: [],
  },
  {
    name: "trades",
    columns: [
      col("trade_id", "SERIAL PRIMARY KEY"),
      col("account_id", "INTEGER NOT NULL"),
      col("symbol", "TEXT NOT NULL"),
      col("timestamp", "TIMESTAMP NOT NULL"),
      col("side", "TEXT NOT NULL"),
      col("quantity", "REAL NOT NULL"),
      col("price", "REAL NOT NULL"),
      col("fee", "REAL DEFAULT 0"),
      col("realized_pl", "REAL DEFAULT 0"),
      col("strategy_name", "TEXT"),
    ],
    constraints: [referencesAccount],
  },
  {
    name: "positions",
    columns: [
      col("position_id", "SERIAL PRIMARY KEY"),
      col("account_id", "INTEGER NOT NULL"),
      col("symbol", "TEXT NOT NULL"),
      col("long_qty", "REAL DEFAULT 0"),
      col("short_qty", "REAL DEFAULT 0"),
      col("long_cost_basis", "REAL DEFAULT 0"),
      col("short_cost_basis", "REAL DEFAULT 0"),
      col("short_margin_used", "REAL DEFAULT 0"),
      col("opened_at", "TIMESTAMP NOT NULL"),
      col("closed_at", "TIMESTAMP"),
    ],
    constraints: [referencesAccount],
  },
  {
    name: "price_data",
    columns: [
      col("id", "SERIAL PRIMARY KEY"),
      col("symbol", "TEXT NOT NULL"),
      col("interval", "TEXT NOT NULL"),
      col("open_time", "TIMESTAMP NOT NULL"),
      col("open", "REAL NOT NULL"),
      col("high", "REAL NOT NULL"),
      col("low", "REAL NOT NULL"),
      col("close", "REAL NOT NULL"),
      col("volume", "REAL NOT NULL"),
      col("close_time", "TIMESTAMP NOT NULL"),
      col("quote_volume", "REAL"),
      col("count", "INTEGER"),
      col("taker_buy_volume", "REAL"),
      col("taker_buy_quote_volume", "REAL"),
    ],
    constraints: [],
  },
  {
    name: "strategy_signals",
    columns: [
      col("signal_id", "SERIAL PRIMARY KEY"),
      col("symbol", "TEXT NOT NULL"),
      col("interval", "TEXT NOT NULL"),
      col("timestamp", "TIMESTAMP NOT NULL"),
      col("strategy_name", "TEXT NOT NULL"),
      col("signal", "TEXT NOT NULL"),
      col("confidence", "REAL"),
      col("metrics", "TEXT"),
    ],
    constraints: [],
  },
  {
    name: "portfolio_history",
    columns: [
      col("record_id", "SERIAL PRIMARY KEY"),
      col("account_id", "INTEGER NOT NULL"),
      col("timestamp", "TIMESTAMP NOT NULL"),
      col("portfolio_value", "REAL NOT NULL"),
      col("long_exposure", "REAL"),
      col("short_exposure", "REAL"),
      col("gross_exposure", "REAL"),
      col("net_exposure", "REAL"),
      col("long_short_ratio", "REAL"),
    ],
    constraints: [referencesAccount],
  },
];

export function quoteIdent(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export function columnSql(column: ColumnDefinition): string {
  return `${quoteIdent(column.name)} ${column.definition}`;
}

export function createTableSql(table: TableDefinition): string {
  const body = [...table.columns.map(columnSql), ...table.constraints].map(line => `  ${line}`).join(",\n");
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.name)} (\n${body}\n)`;
}

export function addColumnSql(table: string, column: ColumnDefinition): string {
  return `ALTER TABLE ${quoteIdent(table)} ADD COLUMN ${columnSql(column)}`;
}
