import type { CellValue, CompleteColumnRoleMap, NormalizedItem, RawRow } from '../interfaces';

const NUMERIC = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;

function text(value: CellValue): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = String(value).trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Strips `$` and thousands separators and parses the rest. Returns null
 * for anything that is not a number; finite numbers pass through.
 */
export function parseAmount(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const raw = text(value);
  if (raw === null) return null;
  const stripped = raw.replace(/[$,]/g, '').trim();
  if (!NUMERIC.test(stripped)) return null;
  const amount = Number(stripped);
  return Number.isFinite(amount) ? amount : null;
}

export interface NormalizationResult {
  items: NormalizedItem[];
  dropped: number;
}

export function normalizeRows(
  rows: readonly RawRow[],
  columns: CompleteColumnRoleMap,
): NormalizationResult {
  const items: NormalizedItem[] = [];

  for (const row of rows) {
    const description = text(row[columns.description]);
    const total = parseAmount(row[columns.total]);
    if (description === null || total === null) continue;

    const quantity = columns.quantity ? text(row[columns.quantity]) : null;
    const unit = columns.unit ? text(row[columns.unit]) : null;

    items.push(
      Object.freeze({
        description,
        total,
        ...(quantity !== null ? { quantity } : {}),
        ...(unit !== null ? { unit } : {}),
      }),
    );
  }

  return { items, dropped: rows.length - items.length };
}
