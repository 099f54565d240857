export type Row = string[];

/** Header row first, data rows after */
export type Table = Row[];

export type MergeAction = "inserted" | "updated";

export interface MergeResult {
  action: MergeAction;
  table: Table;
}

export interface TableSchema {
  header: readonly string[];
  keyColumn: number;
}

export interface TableStore {
  /** Resolves to [] when the table does not exist yet */
  readTable(name: string): Promise<Table>;
  writeTable(name: string, table: Table): Promise<void>;
}
