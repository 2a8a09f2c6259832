import 'reflect-metadata';
import { container, DependencyContainer } from 'tsyringe';
import { ITableSource } from '../adapters/source/table-source.interface';
import { DirectoryTableSource } from '../adapters/source/directory-table-source.adapter';
import { ConsoleDiagnostics } from '../services/console-diagnostics.service';
import { ICsvAnalyzer } from '../services/csv-analyzer.interface';
import { CsvAnalyzerService } from '../services/csv-analyzer.service';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { CsvProcessorService } from '../services/csv-processor.service';
import { IDiagnostics } from '../services/diagnostics.interface';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig, target: DependencyContainer = container): DependencyContainer {
  // Register configuration values
  target.register('AppConfig', { useValue: config });

  // Register adapters
  target.register<ITableSource>('ITableSource', {
    useClass: DirectoryTableSource
  });

  // Register services
  target.register<IDiagnostics>('IDiagnostics', {
    useClass: ConsoleDiagnostics
  });

  target.register<ICsvProcessor>('ICsvProcessor', {
    useClass: CsvProcessorService
  });

  // Transient: every resolve yields an analyzer with its own tables
  target.register<ICsvAnalyzer>('ICsvAnalyzer', {
    useClass: CsvAnalyzerService
  });

  return target;
}
