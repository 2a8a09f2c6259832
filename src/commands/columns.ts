import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { loadInputs } from './inputs';

export async function columnsCommand(analyzer: ICsvAnalyzer, inputs: string[]): Promise<number> {
  const loaded = await loadInputs(analyzer, inputs);
  if (!loaded) {
    return 1;
  }

  const missing = analyzer.listMissingColumnsByFile();
  for (const [file, columns] of analyzer.listColumnsByFile()) {
    console.log(`${file}: ${columns.join(', ')}`);
    const absent = missing.get(file);
    if (absent) {
      console.log(`  missing: ${absent.join(', ')}`);
    }
  }

  return 0;
}
