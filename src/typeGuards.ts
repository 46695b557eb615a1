export function assertIndexInRange(index: number, max: number, label: string): void {
  if (!Number.isInteger(index) || index < 1 || index > max) {
    throw new Error(`${label} index ${String(index)} is outside 1..${String(max)}`);
  }
}

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  throw typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
}

/**
 * Every row must have the same length; the grid may be empty.
 */
export function assertRectangular(rows: readonly (readonly unknown[])[]): void {
  const width = rows[0]?.length ?? 0;
  for (const [index, row] of rows.entries()) {
    if (row.length !== width) {
      throw new Error(`Row ${String(index + 1)} has ${String(row.length)} cells, expected ${String(width)}`);
    }
  }
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}
