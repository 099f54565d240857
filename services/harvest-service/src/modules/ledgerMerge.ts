import { ArticleRecord } from "../interfaces/article";
import { MergeResult, Row, Table, TableSchema } from "../interfaces/ledger";
import { LEDGER_HEADER, LEDGER_URL_COLUMN } from "../constants/ledger";
import { logger } from "../logger";

export const LEDGER_SCHEMA: TableSchema = {
  header: LEDGER_HEADER,
  keyColumn: LEDGER_URL_COLUMN,
};

export function headerMatches(table: Table, header: readonly string[]): boolean {
  const first = table[0];
  return (
    first !== undefined &&
    first.length === header.length &&
    first.every((cell, i) => cell === header[i])
  );
}

/**
 * Returns a table whose first row is exactly `header`.
 *
 * DESTRUCTIVE: when the stored header has drifted (or the table is
 * empty) every existing row is discarded and only the header remains.
 */
export function ensureHeader(table: Table, header: readonly string[]): Table {
  if (headerMatches(table, header)) return table;

  if (table.length > 0) {
    logger.warn(
      { found: table[0], discardedRows: table.length - 1 },
      "Table header drifted, resetting table to header only"
    );
  }
  return [[...header]];
}

/**
 * Insert-or-overwrite keyed on `schema.keyColumn`. The input table is
 * left untouched; an existing row keeps its position.
 */
export function upsertRow(row: Row, table: Table, schema: TableSchema): MergeResult {
  const base = ensureHeader(table, schema.header);
  const key = row[schema.keyColumn];

  const index = base.findIndex(
    (existing, i) => i > 0 && existing[schema.keyColumn] === key
  );

  if (index === -1) {
    return { action: "inserted", table: [...base, [...row]] };
  }

  const next = base.map((existing) => [...existing]);
  next[index] = [...row];
  return { action: "updated", table: next };
}

export function recordToRow(record: ArticleRecord): Row {
  return [
    record.date,
    record.category,
    record.keyword,
    record.headline,
    record.source,
    record.url,
    record.summary,
    record.extractedAt,
  ];
}

export function mergeRecord(record: ArticleRecord, table: Table): MergeResult {
  return upsertRow(recordToRow(record), table, LEDGER_SCHEMA);
}

/** Key values of every data row */
export function keysOf(table: Table, keyColumn: number = LEDGER_URL_COLUMN): Set<string> {
  return new Set(
    table
      .slice(1)
      .map((row) => row[keyColumn])
      .filter((key): key is string => key !== undefined)
  );
}
