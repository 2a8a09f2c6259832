import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { SearchQuery } from '../types/domain.types';
import { loadInputs } from './inputs';

export interface SearchCommandOptions {
  value?: string;
  where?: string[];   // column=value
}

export function buildSearchQuery(options: SearchCommandOptions): SearchQuery {
  if (options.value !== undefined) {
    return options.value;
  }

  const conditions: Record<string, string> = {};
  for (const condition of options.where ?? []) {
    const separator = condition.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid condition "${condition}", expected column=value`);
    }
    conditions[condition.slice(0, separator)] = condition.slice(separator + 1);
  }

  if (Object.keys(conditions).length === 0) {
    throw new Error('Provide --value or at least one --where column=value');
  }
  return conditions;
}

export async function searchCommand(
  analyzer: ICsvAnalyzer,
  inputs: string[],
  options: SearchCommandOptions
): Promise<number> {
  let query: SearchQuery;
  try {
    query = buildSearchQuery(options);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const loaded = await loadInputs(analyzer, inputs);
  if (!loaded) {
    return 1;
  }

  const result = analyzer.searchRows(query);
  console.log(`Found ${result.rows.length} matching row(s)`);
  if (result.rows.length > 0) {
    console.table(result.rows, [...result.columns]);
  }
  return 0;
}
