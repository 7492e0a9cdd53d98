import { stringify } from 'yaml';
import { z } from 'zod';
import { type TableRow, formatTable } from './table.js';

export const OutputFormatSchema = z.enum(['json', 'yaml', 'table']).catch('json');

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export function parseOutputFormat(value: unknown): OutputFormat {
  return OutputFormatSchema.parse(
    typeof value === 'string' ? value.toLowerCase() : value,
  );
}

/**
 * Renders a record or a list of records. Tables use the keys of the first
 * record as columns; a single record becomes a FIELD/VALUE table.
 */
export function renderOutput(data: TableRow | TableRow[], format: OutputFormat): string {
  switch (format) {
    case 'yaml':
      return stringify(data).trimEnd();
    case 'table':
      return Array.isArray(data) ? renderList(data) : renderRecord(data);
    case 'json':
      return JSON.stringify(data, null, 2);
  }
}

export function printOutput(data: TableRow | TableRow[], format: OutputFormat): void {
  console.log(renderOutput(data, format));
}

function renderList(data: TableRow[]): string {
  const first = data[0];
  return formatTable(data, first ? Object.keys(first) : []);
}

function renderRecord(data: TableRow): string {
  return formatTable(
    Object.entries(data).map(([field, value]) => ({ field: field.toUpperCase(), value })),
    ['field', 'value'],
  );
}
