import Papa from 'papaparse';
import * as XLSX from 'xlsx';

import type { GridCell, RawGrid } from '../interfaces';

const cellText = (cell: unknown): string =>
  cell === null || cell === undefined ? '' : String(cell).trim();

/** Numbers stay numbers so a display format cannot round or re-sign them. */
const cellValue = (cell: unknown): GridCell =>
  typeof cell === 'number' && Number.isFinite(cell) ? cell : cellText(cell);

const isBlankRow = (row: GridCell[]) => row.every((cell) => cell === '');

export function csvToGrids(buffer: Buffer): RawGrid[] {
  const text = buffer.toString('utf8').replace(/^\uFEFF/, '');
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: 'greedy' });
  const grid = parsed.data.map((row) => row.map(cellText));
  return grid.length ? [grid] : [];
}

/** One grid per worksheet, with stored cell values rather than formatted text. */
export function workbookToGrids(buffer: Buffer): RawGrid[] {
  const wb = XLSX.read(buffer, { type: 'buffer' });
  const grids: RawGrid[] = [];
  for (const name of wb.SheetNames) {
    const ws = wb.Sheets[name];
    if (!ws) continue;
    const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, defval: '' });
    const grid = rows.map((row) => row.map(cellValue)).filter((row) => !isBlankRow(row));
    if (grid.length) grids.push(grid);
  }
  return grids;
}
