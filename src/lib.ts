// Programmatic entry point
export { setupDI } from './config/di.setup';
export { loadConfig } from './config/app.config';
export type { AppConfig } from './config/app.config';
export { DirectoryTableSource } from './adapters/source/directory-table-source.adapter';
export type { ITableSource } from './adapters/source/table-source.interface';
export { ConsoleDiagnostics } from './services/console-diagnostics.service';
export { CsvAnalyzerService } from './services/csv-analyzer.service';
export type { ICsvAnalyzer } from './services/csv-analyzer.interface';
export { CsvProcessorService } from './services/csv-processor.service';
export type { ICsvProcessor } from './services/csv-processor.interface';
export type { IDiagnostics } from './services/diagnostics.interface';
export * from './types/domain.types';
export * from './types/error.types';
export * from './types/result.types';
