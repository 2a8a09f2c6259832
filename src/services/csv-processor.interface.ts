import { CsvRecord, LoadedTable } from '../types/domain.types';
import { FileReadError } from '../types/error.types';
import { Result } from '../types/result.types';

export interface ICsvProcessor {
  /**
   * Reads and parses a whole CSV file.
   * @returns success with the table, or failure with a FileReadError for unreadable or malformed input
   */
  readTable(filePath: string, sourcePath: string): Promise<Result<LoadedTable, FileReadError>>;

  /** Creates the directory (and parents) if absent. Rejects when it cannot be created. */
  prepareOutputDir(outputDir: string): Promise<void>;

  /**
   * Writes a header line from `columns` followed by one line per record, replacing any existing file.
   * Cells a record lacks are left empty. Rejects on write failure.
   */
  writeTable(outputPath: string, columns: readonly string[], rows: readonly CsvRecord[]): Promise<void>;
}
