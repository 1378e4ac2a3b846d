import type { GridCell, RawGrid, RawRow, RawTable } from '../interfaces';

export function cleanHeader(header: unknown): string {
  return String(header ?? '')
    .trim()
    .toLowerCase()
    .replace(/ /g, '_')
    .replace(/\./g, '');
}

function headerRow(grid: RawGrid): string[] {
  const seen = new Map<string, number>();
  return (grid[0] ?? []).map((cell, index) => {
    const base = cleanHeader(cell) || `column_${index + 1}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/**
 * Concatenates extracted grids into one table. Grids holding only a header
 * row are skipped; the column list is the union of all headers in order of
 * first appearance.
 */
export function buildRawTable(grids: readonly RawGrid[]): RawTable {
  const columns: string[] = [];
  const rows: RawRow[] = [];

  for (const grid of grids) {
    if (grid.length < 2) continue;

    const headers = headerRow(grid);
    for (const header of headers) {
      if (!columns.includes(header)) columns.push(header);
    }

    for (const cells of grid.slice(1)) {
      const row: Record<string, GridCell> = {};
      headers.forEach((header, index) => {
        const cell = cells[index];
        if (cell !== undefined) row[header] = cell;
      });
      rows.push(row);
    }
  }

  return { columns, rows };
}
