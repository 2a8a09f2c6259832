import * as path from 'path';
import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { isFailure, LoadSummary } from '../types/result.types';

/**
 * A single argument without a .csv extension is a directory; anything else is a file list.
 * @returns undefined when the directory could not be used
 */
export async function loadInputs(analyzer: ICsvAnalyzer, inputs: string[]): Promise<LoadSummary | undefined> {
  if (inputs.length === 1 && path.extname(inputs[0]).toLowerCase() !== '.csv') {
    const result = await analyzer.loadFromDirectory(inputs[0]);
    if (isFailure(result)) {
      console.error(`Error: ${result.message}`);
      return undefined;
    }
    console.log(result.message);
    return result.data;
  }

  const summary = await analyzer.loadFromFiles(inputs);
  console.log(`Loaded ${summary.loaded} of ${inputs.length} CSV file(s)`);
  return summary;
}
