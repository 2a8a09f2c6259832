// Result types for service responses

import { AnalyzerError, ExportError, FileReadError } from './error.types';

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T, E extends AnalyzerError = AnalyzerError> =
  | { readonly success: true; readonly data: T; readonly message: string }     // Success with data
  | { readonly success: false; readonly error: E; readonly message: string };  // Failure

export interface LoadSummary {
  loaded: number;
  files: string[];          // sourcePath of every table now held, in load order
  errors: FileReadError[];  // One per skipped file
}

export interface ExportedFile {
  outputPath: string;
  rows: number;
}

export interface UnmatchedExportSummary {
  written: ExportedFile[];
  errors: ExportError[];
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

export function isSuccess<T, E extends AnalyzerError>(
  result: Result<T, E>
): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success;
}

export function isFailure<T, E extends AnalyzerError>(
  result: Result<T, E>
): result is { readonly success: false; readonly error: E; readonly message: string } {
  return !result.success;
}

export function succeed<T>(data: T, message: string): Result<T, never> {
  return { success: true, data, message };
}

export function fail<E extends AnalyzerError>(error: E): Result<never, E> {
  return { success: false, error, message: error.message };
}
