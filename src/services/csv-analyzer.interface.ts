import { GroupingResult, LoadedTable, SearchQuery, SearchResult, TableInput } from '../types/domain.types';
import { EmptyResultError, ExportError, GroupingError, PathError } from '../types/error.types';
import { ExportedFile, LoadSummary, Result, UnmatchedExportSummary } from '../types/result.types';

/**
 * Load -> group -> export over a set of CSV tables.
 * Every load replaces the tables held by the instance.
 */
export interface ICsvAnalyzer {
  readonly tables: readonly LoadedTable[];

  loadFromDirectory(directory: string): Promise<Result<LoadSummary, PathError>>;
  loadFromFiles(filePaths: readonly string[]): Promise<LoadSummary>;
  useTables(tables: Readonly<Record<string, TableInput>>): LoadSummary;

  groupedDataByColumn(columnName: string): Result<GroupingResult, GroupingError>;

  exportMatchedData(
    outputDir: string,
    grouping: GroupingResult,
    outputPrefix?: string
  ): Promise<Result<ExportedFile, EmptyResultError | ExportError>>;
  exportUnmatchedData(
    outputDir: string,
    grouping: GroupingResult,
    outputPrefix?: string
  ): Promise<UnmatchedExportSummary>;

  listFilenames(): string[];
  listColumnsByFile(): Map<string, string[]>;
  listMissingColumnsByFile(): Map<string, string[]>;
  getColumnData(columnName: string): Map<string, string[]>;
  searchRows(query: SearchQuery): SearchResult;
}
