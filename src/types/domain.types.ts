// Domain types - tables as loaded from CSV, independent of the parser's output shape

/**
 * One CSV row: column name -> raw cell text.
 * Column order lives on the owning table's `columns`.
 */
export type CsvRecord = Readonly<Record<string, string>>;

export interface LoadedTable {
  readonly sourcePath: string;   // Tag written to source_file (base name of the file)
  readonly filePath: string;     // Path the table was read from
  readonly columns: readonly string[];
  readonly rows: readonly CsvRecord[];
}

export interface SourcedRecord {
  readonly record: CsvRecord;
  readonly sourcePath: string;
}

/**
 * Rows partitioned by a grouping column.
 * Map iteration order is first-encounter order of the key / load order of the table.
 */
export interface GroupingResult {
  readonly column: string;
  readonly matched: ReadonlyMap<string, readonly SourcedRecord[]>;
  readonly matchedColumns: readonly string[];
  readonly unmatched: ReadonlyMap<string, LoadedTable>;
}

/**
 * In-memory table handed to the analyzer without going through a file.
 */
export interface TableInput {
  columns: readonly string[];
  rows: ReadonlyArray<Record<string, unknown>>;
}

export type SearchQuery = string | Readonly<Record<string, string>>;

export interface SearchResult {
  readonly columns: readonly string[];   // Always ends with source_file
  readonly rows: readonly CsvRecord[];
}

export const SOURCE_FILE_COLUMN = 'source_file';
