import stringWidth from 'string-width';

export type TableColumn = {
  key: string;
  header: string;
  maxWidth?: number;
};

export type RenderTableOptions = {
  columns: TableColumn[];
  rows: Array<Record<string, string>>;
  sep?: string;
};

export function padDisplay(text: string, width: number): string {
  const w = stringWidth(text);
  if (w >= width) return text;
  return text + ' '.repeat(width - w);
}

export function truncateDisplay(text: string, max: number): string {
  if (max <= 0) return '';
  if (stringWidth(text) <= max) return text;
  if (max === 1) return text.slice(0, 1);
  let out = '';
  for (const ch of text) {
    if (stringWidth(out + ch) >= max) break;
    out += ch;
  }
  return `${out}…`;
}

/**
 * Renders rows as a left-aligned text table with a dashed rule under the
 * header. Cells wider than a column's `maxWidth` are truncated with `…`.
 * Trailing padding is trimmed from every line.
 */
export function renderTable({ columns, rows, sep = '  ' }: RenderTableOptions): string {
  if (rows.length === 0) return '';

  const cells = rows.map((row) =>
    columns.map((col) => {
      const value = row[col.key] ?? '';
      return col.maxWidth !== undefined ? truncateDisplay(value, col.maxWidth) : value;
    }),
  );
  const widths = columns.map((col, idx) =>
    Math.max(stringWidth(col.header), ...cells.map((row) => stringWidth(row[idx]))),
  );

  const line = (values: string[]) => values.map((v, idx) => padDisplay(v, widths[idx])).join(sep).trimEnd();

  return [
    line(columns.map((col) => col.header)),
    line(widths.map((w) => '-'.repeat(Math.max(3, w)))),
    ...cells.map(line),
  ].join('\n');
}
