/**
 * Union of column lists, in first-seen order.
 */
export function unionColumns(columnLists: Iterable<readonly string[]>): string[] {
  const seen = new Set<string>();
  for (const columns of columnLists) {
    for (const column of columns) {
      seen.add(column);
    }
  }
  return [...seen];
}

export function findDuplicateColumns(columns: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      duplicates.add(column);
    }
    seen.add(column);
  }
  return [...duplicates];
}

// Names a plain-object record cannot hold as a cell
const RESERVED_COLUMNS: ReadonlySet<string> = new Set(['__proto__']);

export function findReservedColumns(columns: readonly string[]): string[] {
  return columns.filter((column) => RESERVED_COLUMNS.has(column));
}

/**
 * Cell value of a record, or '' when the record has no such column.
 * Only own properties count, so names like `constructor` never reach the prototype.
 */
export function cellOf(record: Readonly<Record<string, string>>, column: string): string {
  return Object.prototype.hasOwnProperty.call(record, column) ? record[column] : '';
}
