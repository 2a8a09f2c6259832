import { mkdir, readFile, writeFile } from 'fs/promises';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { injectable } from 'tsyringe';
import { cellOf, findDuplicateColumns, findReservedColumns } from '../utils/columns.util';
import { CsvRecord, LoadedTable } from '../types/domain.types';
import { describeError, FileReadError } from '../types/error.types';
import { fail, Result, succeed } from '../types/result.types';
import { ICsvProcessor } from './csv-processor.interface';

interface ParsedCsv {
  header: string[] | undefined;
  records: unknown;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((cell) => typeof cell === 'string');
}

@injectable()
export class CsvProcessorService implements ICsvProcessor {
  async readTable(filePath: string, sourcePath: string): Promise<Result<LoadedTable, FileReadError>> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      return fail(new FileReadError(filePath, `Failed to read ${filePath}: ${describeError(error)}`, error));
    }

    let parsed: ParsedCsv;
    try {
      parsed = await this.parseContent(content);
    } catch (error) {
      return fail(new FileReadError(filePath, `Malformed CSV in ${filePath}: ${describeError(error)}`, error));
    }

    const { header, records } = parsed;
    if (!header || header.length === 0) {
      return fail(new FileReadError(filePath, `Malformed CSV in ${filePath}: missing header row`));
    }
    if (header.some((column) => column === '')) {
      return fail(new FileReadError(filePath, `Malformed CSV in ${filePath}: empty column name in header`));
    }
    const reserved = findReservedColumns(header);
    if (reserved.length > 0) {
      return fail(new FileReadError(
        filePath,
        `Malformed CSV in ${filePath}: reserved column name(s) ${reserved.join(', ')}`
      ));
    }
    const duplicates = findDuplicateColumns(header);
    if (duplicates.length > 0) {
      return fail(new FileReadError(
        filePath,
        `Malformed CSV in ${filePath}: duplicate column(s) ${duplicates.join(', ')}`
      ));
    }
    if (!Array.isArray(records) || !records.every(isStringRecord)) {
      return fail(new FileReadError(filePath, `Malformed CSV in ${filePath}: unexpected record shape`));
    }

    const rows: CsvRecord[] = records.map((record) => Object.freeze({ ...record }));
    return succeed(
      {
        sourcePath,
        filePath,
        columns: Object.freeze([...header]),
        rows: Object.freeze(rows)
      },
      `Loaded ${rows.length} row(s) from ${filePath}`
    );
  }

  async prepareOutputDir(outputDir: string): Promise<void> {
    await mkdir(outputDir, { recursive: true });
  }

  async writeTable(outputPath: string, columns: readonly string[], rows: readonly CsvRecord[]): Promise<void> {
    // Rows as arrays so the header is written even when there are no rows
    const lines: string[][] = [
      [...columns],
      ...rows.map((row) => columns.map((column) => cellOf(row, column)))
    ];

    const output = await new Promise<string>((resolve, reject) => {
      stringify(lines, (err, result) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(result);
      });
    });

    await writeFile(outputPath, output, 'utf-8');
  }

  private parseContent(content: string): Promise<ParsedCsv> {
    return new Promise((resolve, reject) => {
      let header: string[] | undefined;

      parse(
        content,
        {
          bom: true,
          skip_empty_lines: true,
          columns: (firstLine: string[]) => {
            header = firstLine;
            return firstLine;
          }
        },
        (err, records) => {
          if (err) {
            reject(err);
            return;
          }
          resolve({ header, records });
        }
      );
    });
  }
}
