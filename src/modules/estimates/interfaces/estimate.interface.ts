export const CATEGORIES = [
  'Roofing',
  'Electrical',
  'Plumbing',
  'Drywall/Painting',
  'Foundation/Concrete',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Categories that own keywords, in the order they are tested. */
export type KeywordCategory = Exclude<Category, 'Other'>;

export const UNASSIGNED = 'Unassigned';

export type TradeKeywords = Readonly<Record<KeywordCategory, readonly string[]>>;

export type GridCell = string | number;

/** One grid as the extractor saw it: first row is the header. */
export type RawGrid = GridCell[][];

export type CellValue = string | number | null | undefined;

export type RawRow = Readonly<Record<string, CellValue>>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

export type ColumnRole = 'description' | 'total' | 'quantity' | 'unit';

export type ColumnRoleMap = Partial<Record<ColumnRole, string>>;

export interface CompleteColumnRoleMap extends ColumnRoleMap {
  description: string;
  total: string;
}

export type ColumnResolution =
  | { complete: true; roles: CompleteColumnRoleMap }
  | { complete: false; roles: ColumnRoleMap; missing: ColumnRole[] };

export interface NormalizedItem {
  readonly description: string;
  readonly total: number;
  readonly quantity?: string;
  readonly unit?: string;
}

export interface CategorizedItem extends NormalizedItem {
  readonly category: Category;
}

export interface DelegatedItem extends CategorizedItem {
  readonly assignedTo: string;
}

export interface ContractorInput {
  name: string;
  payoutFraction: number;
}

export interface CategoryRuleInput {
  category: Category;
  assignee: string;
}

/** Immutable per-run configuration built from the form input. */
export interface RunConfig {
  readonly payouts: ReadonlyMap<string, number>;
  readonly assignments: ReadonlyMap<Category, string>;
}
