import { readdir, stat } from 'fs/promises';
import * as path from 'path';
import { injectable } from 'tsyringe';
import { describeError, PathError } from '../../types/error.types';
import { fail, Result, succeed } from '../../types/result.types';
import { ITableSource } from './table-source.interface';

const CSV_EXTENSION = '.csv';

@injectable()
export class DirectoryTableSource implements ITableSource {
  async listCsvFiles(directory: string): Promise<Result<string[], PathError>> {
    try {
      const info = await stat(directory);
      if (!info.isDirectory()) {
        return fail(new PathError(directory, `Not a directory: ${directory}`));
      }
    } catch (error) {
      return fail(new PathError(directory, `Directory not found: ${directory}`, error));
    }

    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      return fail(new PathError(directory, `Cannot list ${directory}: ${describeError(error)}`, error));
    }

    const files: string[] = [];
    for (const name of names.filter((n) => n.endsWith(CSV_EXTENSION)).sort()) {
      const filePath = path.join(directory, name);
      // Follows symlinks. Entries that cannot be stat'ed are kept so the reader reports them.
      const entry = await stat(filePath).catch(() => undefined);
      if (!entry || entry.isFile()) {
        files.push(filePath);
      }
    }

    return succeed(files, `Found ${files.length} CSV file(s) in ${directory}`);
  }
}
