import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { EmptyResultError } from '../types/error.types';
import { isFailure } from '../types/result.types';
import { loadInputs } from './inputs';

export interface GroupCommandOptions {
  by: string;
  out: string;
  prefix: string;
  unmatchedPrefix?: string;
  skipUnmatched?: boolean;
}

/**
 * Load -> group -> export. Resolves to the process exit code.
 */
export async function groupCommand(
  analyzer: ICsvAnalyzer,
  inputs: string[],
  options: GroupCommandOptions
): Promise<number> {
  const loaded = await loadInputs(analyzer, inputs);
  if (!loaded) {
    return 1;
  }

  const grouping = analyzer.groupedDataByColumn(options.by);
  if (isFailure(grouping)) {
    console.error(`Error: ${grouping.message}`);
    return 1;
  }
  console.log(grouping.message);

  let exitCode = 0;

  const matched = await analyzer.exportMatchedData(options.out, grouping.data, options.prefix);
  if (isFailure(matched)) {
    // Nothing matched is reported but is not a failure
    if (!(matched.error instanceof EmptyResultError)) {
      exitCode = 1;
    }
  } else {
    console.log(matched.message);
  }

  if (!options.skipUnmatched) {
    const unmatched = await analyzer.exportUnmatchedData(options.out, grouping.data, options.unmatchedPrefix);
    console.log(`Exported ${unmatched.written.length} unmatched file(s), ${unmatched.errors.length} failed`);
    if (unmatched.errors.length > 0) {
      exitCode = 1;
    }
  }

  return exitCode;
}
