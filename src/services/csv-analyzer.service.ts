import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { ITableSource } from '../adapters/source/table-source.interface';
import {
  CsvRecord,
  GroupingResult,
  LoadedTable,
  SearchQuery,
  SearchResult,
  SOURCE_FILE_COLUMN,
  SourcedRecord,
  TableInput,
} from '../types/domain.types';
import {
  describeError,
  EmptyResultError,
  ExportError,
  FileReadError,
  GroupingError,
  PathError,
} from '../types/error.types';
import {
  ExportedFile,
  fail,
  isFailure,
  LoadSummary,
  Result,
  succeed,
  UnmatchedExportSummary,
} from '../types/result.types';
import { cellOf, findDuplicateColumns, findReservedColumns, unionColumns } from '../utils/columns.util';
import { claimOutputPath, matchedOutputPath, unmatchedOutputPath } from '../utils/filename.util';
import { ICsvAnalyzer } from './csv-analyzer.interface';
import { ICsvProcessor } from './csv-processor.interface';
import { IDiagnostics } from './diagnostics.interface';

type RowPredicate = (row: CsvRecord) => boolean;

@injectable()
export class CsvAnalyzerService implements ICsvAnalyzer {
  private static readonly DEFAULT_PREFIX = 'grouped';

  private loadedTables: readonly LoadedTable[] = [];

  constructor(
    @inject('ICsvProcessor') private csvProcessor: ICsvProcessor,
    @inject('ITableSource') private tableSource: ITableSource,
    @inject('IDiagnostics') private diagnostics: IDiagnostics,
  ) {}

  get tables(): readonly LoadedTable[] {
    return this.loadedTables;
  }

  async loadFromDirectory(directory: string): Promise<Result<LoadSummary, PathError>> {
    const listing = await this.tableSource.listCsvFiles(directory);
    if (isFailure(listing)) {
      this.diagnostics.warn(listing.message);
      return listing;
    }

    const summary = await this.loadFromFiles(listing.data);
    return succeed(summary, `Loaded ${summary.loaded} of ${listing.data.length} CSV file(s) from ${directory}`);
  }

  async loadFromFiles(filePaths: readonly string[]): Promise<LoadSummary> {
    const tables: LoadedTable[] = [];
    const errors: FileReadError[] = [];
    const taken = new Set<string>();
    const seen = new Set<string>();

    // One file at a time: each is read whole and released before the next
    for (const filePath of filePaths) {
      const resolved = path.resolve(filePath);
      if (seen.has(resolved)) {
        this.skip(errors, new FileReadError(filePath, `Duplicate input ${filePath}: already loaded`));
        continue;
      }
      seen.add(resolved);

      const sourcePath = this.pickSourcePath(filePath, resolved, taken);
      const result = await this.csvProcessor.readTable(filePath, sourcePath);
      if (isFailure(result)) {
        this.skip(errors, result.error);
        continue;
      }

      taken.add(sourcePath);
      tables.push(result.data);
      this.diagnostics.info(`Successfully loaded: ${filePath}`);
    }

    return this.replaceTables(tables, errors);
  }

  useTables(inputs: Readonly<Record<string, TableInput>>): LoadSummary {
    const tables: LoadedTable[] = [];
    const errors: FileReadError[] = [];

    for (const [name, input] of Object.entries(inputs)) {
      try {
        tables.push(this.toLoadedTable(name, input));
        this.diagnostics.info(`Successfully loaded table: ${name}`);
      } catch (error) {
        this.skip(errors, new FileReadError(name, `Invalid table ${name}: ${describeError(error)}`, error));
      }
    }

    return this.replaceTables(tables, errors);
  }

  groupedDataByColumn(columnName: string): Result<GroupingResult, GroupingError> {
    if (this.loadedTables.length === 0) {
      return this.groupingFailure('No data loaded; load CSV files before grouping');
    }
    if (columnName.length === 0) {
      return this.groupingFailure('Column name must not be empty');
    }

    const matched = new Map<string, SourcedRecord[]>();
    const unmatched = new Map<string, LoadedTable>();
    const matchedTables: LoadedTable[] = [];

    for (const table of this.loadedTables) {
      if (!table.columns.includes(columnName)) {
        unmatched.set(table.sourcePath, table);
        continue;
      }

      matchedTables.push(table);
      for (const record of table.rows) {
        // Raw cell text is the key: no trimming, case-folding or number parsing
        const key = cellOf(record, columnName);
        const entry: SourcedRecord = { record, sourcePath: table.sourcePath };
        const group = matched.get(key);
        if (group) {
          group.push(entry);
        } else {
          matched.set(key, [entry]);
        }
      }
    }

    return succeed(
      {
        column: columnName,
        matched,
        matchedColumns: unionColumns(matchedTables.map((table) => table.columns)),
        unmatched,
      },
      `Grouped ${matchedTables.length} table(s) by "${columnName}" into ${matched.size} group(s); ${unmatched.size} table(s) lack the column`,
    );
  }

  async exportMatchedData(
    outputDir: string,
    grouping: GroupingResult,
    outputPrefix: string = CsvAnalyzerService.DEFAULT_PREFIX,
  ): Promise<Result<ExportedFile, EmptyResultError | ExportError>> {
    if (grouping.matched.size === 0) {
      const error = new EmptyResultError(`No matched data to export for column "${grouping.column}"`);
      this.diagnostics.warn(error.message);
      return fail(error);
    }

    const outputPath = matchedOutputPath(outputDir, outputPrefix);
    const columns = [
      ...grouping.matchedColumns.filter((column) => column !== SOURCE_FILE_COLUMN),
      SOURCE_FILE_COLUMN,
    ];
    const rows: CsvRecord[] = [];
    for (const group of grouping.matched.values()) {
      for (const { record, sourcePath } of group) {
        rows.push({ ...record, [SOURCE_FILE_COLUMN]: sourcePath });
      }
    }

    try {
      await this.csvProcessor.prepareOutputDir(outputDir);
      await this.csvProcessor.writeTable(outputPath, columns, rows);
    } catch (cause) {
      const error = new ExportError(outputPath, `Error exporting combined data to ${outputPath}: ${describeError(cause)}`, cause);
      this.diagnostics.warn(error.message);
      return fail(error);
    }

    this.diagnostics.info(`Successfully exported combined data to: ${outputPath}`);
    return succeed({ outputPath, rows: rows.length }, `Exported ${rows.length} row(s) to ${outputPath}`);
  }

  async exportUnmatchedData(
    outputDir: string,
    grouping: GroupingResult,
    outputPrefix?: string,
  ): Promise<UnmatchedExportSummary> {
    const summary: UnmatchedExportSummary = { written: [], errors: [] };
    if (grouping.unmatched.size === 0) {
      this.diagnostics.info('No unmatched data to export');
      return summary;
    }

    // Distinct tags may sanitize to the same name; later tables get a numbered suffix
    const claimed = new Set<string>();
    const targets = [...grouping.unmatched.values()].map((table) => ({
      table,
      outputPath: claimOutputPath(unmatchedOutputPath(outputDir, table.sourcePath, outputPrefix), claimed),
    }));

    try {
      await this.csvProcessor.prepareOutputDir(outputDir);
    } catch (cause) {
      // Every file would fail the same way; report each one
      for (const { outputPath } of targets) {
        this.recordExportFailure(summary, new ExportError(
          outputPath,
          `Cannot create output directory ${outputDir}: ${describeError(cause)}`,
          cause,
        ));
      }
      return summary;
    }

    for (const { table, outputPath } of targets) {
      try {
        await this.csvProcessor.writeTable(outputPath, table.columns, table.rows);
        summary.written.push({ outputPath, rows: table.rows.length });
        this.diagnostics.info(`Successfully exported: ${outputPath}`);
      } catch (cause) {
        this.recordExportFailure(summary, new ExportError(
          outputPath,
          `Error exporting ${table.sourcePath} to ${outputPath}: ${describeError(cause)}`,
          cause,
        ));
      }
    }

    return summary;
  }

  listFilenames(): string[] {
    return this.loadedTables.map((table) => table.sourcePath);
  }

  listColumnsByFile(): Map<string, string[]> {
    return new Map(this.loadedTables.map((table) => [table.sourcePath, [...table.columns]]));
  }

  listMissingColumnsByFile(): Map<string, string[]> {
    const allColumns = unionColumns(this.loadedTables.map((table) => table.columns));
    const missing = new Map<string, string[]>();

    for (const table of this.loadedTables) {
      const absent = allColumns.filter((column) => !table.columns.includes(column));
      if (absent.length > 0) {
        missing.set(table.sourcePath, absent);
      }
    }

    return missing;
  }

  getColumnData(columnName: string): Map<string, string[]> {
    const data = new Map<string, string[]>();

    for (const table of this.loadedTables) {
      if (!table.columns.includes(columnName)) {
        continue;
      }
      const values = table.rows
        .map((row) => cellOf(row, columnName))
        .filter((value) => value !== '');
      if (values.length > 0) {
        data.set(table.sourcePath, values);
      }
    }

    return data;
  }

  searchRows(query: SearchQuery): SearchResult {
    const rows: CsvRecord[] = [];
    const contributing: LoadedTable[] = [];

    for (const table of this.loadedTables) {
      const predicate = this.buildPredicate(table, query);
      if (!predicate) {
        continue;
      }

      const hits = table.rows.filter(predicate);
      if (hits.length === 0) {
        continue;
      }

      contributing.push(table);
      for (const row of hits) {
        rows.push({ ...row, [SOURCE_FILE_COLUMN]: table.sourcePath });
      }
    }

    const columns = [
      ...unionColumns(contributing.map((table) => table.columns)).filter((column) => column !== SOURCE_FILE_COLUMN),
      SOURCE_FILE_COLUMN,
    ];
    return { columns, rows };
  }

  private replaceTables(tables: LoadedTable[], errors: FileReadError[]): LoadSummary {
    this.loadedTables = Object.freeze(tables);
    return {
      loaded: tables.length,
      files: tables.map((table) => table.sourcePath),
      errors,
    };
  }

  /**
   * Base name of the file, or the path as given when an earlier file already took that name.
   * The resolved path is the last resort; it is unique once repeated inputs are skipped.
   */
  private pickSourcePath(filePath: string, resolved: string, taken: ReadonlySet<string>): string {
    return [path.basename(filePath), filePath].find((candidate) => !taken.has(candidate)) ?? resolved;
  }

  private toLoadedTable(name: string, input: TableInput): LoadedTable {
    const columns = [...input.columns];
    if (columns.length === 0) {
      throw new Error('no columns');
    }
    if (columns.some((column) => column === '')) {
      throw new Error('empty column name');
    }
    const reserved = findReservedColumns(columns);
    if (reserved.length > 0) {
      throw new Error(`reserved column name(s) ${reserved.join(', ')}`);
    }
    const duplicates = findDuplicateColumns(columns);
    if (duplicates.length > 0) {
      throw new Error(`duplicate column(s) ${duplicates.join(', ')}`);
    }

    const rows = input.rows.map((row, index) => {
      const unknownKeys = Object.keys(row).filter((key) => !columns.includes(key));
      if (unknownKeys.length > 0) {
        throw new Error(`row ${index + 1} has unknown column(s) ${unknownKeys.join(', ')}`);
      }

      const record: Record<string, string> = {};
      for (const column of columns) {
        const value = Object.prototype.hasOwnProperty.call(row, column) ? row[column] : undefined;
        record[column] = this.toCell(value, index, column);
      }
      return Object.freeze(record);
    });

    return {
      sourcePath: name,
      filePath: name,
      columns: Object.freeze(columns),
      rows: Object.freeze(rows),
    };
  }

  private toCell(value: unknown, index: number, column: string): string {
    if (value === undefined || value === null) {
      return '';
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    throw new Error(`row ${index + 1} has a non-scalar value in column ${column}`);
  }

  /**
   * Case-insensitive substring matching. Returns undefined when the table cannot match at all.
   */
  private buildPredicate(table: LoadedTable, query: SearchQuery): RowPredicate | undefined {
    const contains = (cell: string, needle: string) =>
      cell.toLowerCase().includes(needle.toLowerCase());

    if (typeof query === 'string') {
      return (row) => table.columns.some((column) => contains(cellOf(row, column), query));
    }

    const conditions = Object.entries(query);
    if (conditions.length === 0 || conditions.some(([column]) => !table.columns.includes(column))) {
      return undefined;
    }
    return (row) => conditions.every(([column, needle]) => contains(cellOf(row, column), needle));
  }

  private skip(errors: FileReadError[], error: FileReadError): void {
    errors.push(error);
    this.diagnostics.warn(`Skipping ${error.filePath}: ${error.message}`);
  }

  private recordExportFailure(summary: UnmatchedExportSummary, error: ExportError): void {
    summary.errors.push(error);
    this.diagnostics.warn(error.message);
  }

  private groupingFailure(message: string): Result<never, GroupingError> {
    const error = new GroupingError(message);
    this.diagnostics.warn(error.message);
    return fail(error);
  }
}
