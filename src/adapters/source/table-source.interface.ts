import { PathError } from '../../types/error.types';
import { Result } from '../../types/result.types';

/**
 * Locates the CSV inputs of a directory.
 */
export interface ITableSource {
  /**
   * Lists the `.csv` files directly inside `directory` (no recursion), sorted by name.
   * @returns failure with PathError if the directory is missing or not a directory
   */
  listCsvFiles(directory: string): Promise<Result<string[], PathError>>;
}
