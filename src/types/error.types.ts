// Error taxonomy for the load -> group -> export pipeline

export type AnalyzerErrorKind =
  | 'PATH_ERROR'
  | 'FILE_READ_ERROR'
  | 'GROUPING_ERROR'
  | 'EMPTY_RESULT_ERROR'
  | 'EXPORT_ERROR';

export abstract class AnalyzerError extends Error {
  abstract readonly kind: AnalyzerErrorKind;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input directory is missing or is not a directory. */
export class PathError extends AnalyzerError {
  readonly kind = 'PATH_ERROR' as const;

  constructor(public readonly path: string, message: string, cause?: unknown) {
    super(message, cause);
  }
}

/** A single input could not be read or parsed; the file is skipped. */
export class FileReadError extends AnalyzerError {
  readonly kind = 'FILE_READ_ERROR' as const;

  constructor(public readonly filePath: string, message: string, cause?: unknown) {
    super(message, cause);
  }
}

export class GroupingError extends AnalyzerError {
  readonly kind = 'GROUPING_ERROR' as const;
}

/** Nothing to export; no file is written. */
export class EmptyResultError extends AnalyzerError {
  readonly kind = 'EMPTY_RESULT_ERROR' as const;
}

export class ExportError extends AnalyzerError {
  readonly kind = 'EXPORT_ERROR' as const;

  constructor(public readonly outputPath: string, message: string, cause?: unknown) {
    super(message, cause);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
