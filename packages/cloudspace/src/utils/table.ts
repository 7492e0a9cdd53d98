export type TableRow = Record<string, unknown>;

function cell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatTable(data: TableRow[], columns: string[]): string {
  if (data.length === 0) {
    return 'No data found';
  }

  const widths = columns.map((col) => {
    const contentWidth = Math.max(...data.map((item) => cell(item[col]).length));
    return Math.max(col.length, contentWidth);
  });

  const header = columns
    .map((col, i) => col.toUpperCase().padEnd(widths[i] ?? 0))
    .join('  ');

  const rows = data.map((item) =>
    columns
      .map((col, i) => cell(item[col]).padEnd(widths[i] ?? 0))
      .join('  '),
  );

  return [header, ...rows].map((line) => line.trimEnd()).join('\n');
}
