import type { TunnelListing } from '../domain/entities/tunnel.entity.js';

const HEADERS = ['Key (host:port)', 'Process ID', 'Status', 'Link'];

/**
 * Render sessions as a borderless, left-aligned table.
 * Columns are separated by two spaces; trailing padding is trimmed.
 */
export function formatSessionTable(rows: TunnelListing[]): string {
  const cells = rows.map((row) => [
    row.key,
    row.processId === null ? '' : String(row.processId),
    row.status,
    row.link,
  ]);
  const table = [HEADERS, ...cells];
  const widths = HEADERS.map((_, column) => Math.max(...table.map((line) => line[column].length)));

  return table
    .map((line) => line.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd())
    .join('\n');
}
