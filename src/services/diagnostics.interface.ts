/**
 * Sink for operator-facing messages (skipped files, empty results, write failures).
 */
export interface IDiagnostics {
  info(message: string): void;
  warn(message: string): void;
}
