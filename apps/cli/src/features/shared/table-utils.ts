/**
 * Plain-text tables for the text output mode.
 */

type Align = 'left' | 'right';

export interface ColumnDef<T> {
  header: string;
  format: (item: T) => string;
  align?: Align | undefined;
  minWidth?: number | undefined;
}

/**
 * Compute the maximum width needed for a column based on formatted values.
 */
export function computeColumnWidth<T>(items: readonly T[], formatter: (item: T) => string, minWidth = 0): number {
  let maxWidth = minWidth;

  for (const item of items) {
    maxWidth = Math.max(maxWidth, formatter(item).length);
  }

  return maxWidth;
}

/**
 * Header line, a rule, then one line per item. Columns are separated by two
 * spaces and sized to their widest value.
 *
 * @example
 * ```ts
 * renderTable(entries, [
 *   { header: 'BANK', format: (e) => e.bank },
 *   { header: 'RATE', format: (e) => e.rate.toFixed(4), align: 'right' },
 * ]);
 * ```
 */
export function renderTable<T>(items: readonly T[], columns: readonly ColumnDef<T>[]): string[] {
  const widths = columns.map((column) =>
    computeColumnWidth(items, column.format, Math.max(column.minWidth ?? 0, column.header.length))
  );

  const line = (cells: string[]) =>
    cells
      .map((cell, index) => {
        const width = widths[index] ?? cell.length;
        return columns[index]?.align === 'right' ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  return [
    line(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...items.map((item) => line(columns.map((column) => column.format(item)))),
  ];
}
