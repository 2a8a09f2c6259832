import * as path from 'path';

const UNSAFE_CHARS = /[^A-Za-z0-9._-]/g;

/**
 * Reduces a free-form name to something safe to use as a file name.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(UNSAFE_CHARS, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned : 'unnamed';
}

export function matchedOutputPath(outputDir: string, outputPrefix: string): string {
  return path.join(outputDir, `${sanitizeFileName(outputPrefix)}.csv`);
}

/**
 * `<prefix>_<base>.csv`, or `<base>.csv` without a prefix.
 * The base is the source tag without its extension, sanitized. Different tags
 * can still sanitize to the same name; see `claimOutputPath`.
 */
export function unmatchedOutputPath(
  outputDir: string,
  sourcePath: string,
  outputPrefix?: string
): string {
  const base = sanitizeFileName(sourcePath.slice(0, sourcePath.length - path.extname(sourcePath).length));
  const fileName = outputPrefix ? `${sanitizeFileName(outputPrefix)}_${base}` : base;
  return path.join(outputDir, `${fileName}.csv`);
}

/**
 * Reserves `outputPath` in `taken`, appending `_2`, `_3`, ... before the
 * extension while the name is already reserved. Names are compared
 * case-insensitively since some file systems do.
 */
export function claimOutputPath(outputPath: string, taken: Set<string>): string {
  const extension = path.extname(outputPath);
  const stem = outputPath.slice(0, outputPath.length - extension.length);

  let candidate = outputPath;
  for (let suffix = 2; taken.has(candidate.toLowerCase()); suffix++) {
    candidate = `${stem}_${suffix}${extension}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}
