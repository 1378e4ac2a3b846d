import { ratio } from 'fuzzball';

import type { ColumnResolution, ColumnRole, ColumnRoleMap } from '../interfaces';

interface RoleMatcher {
  role: ColumnRole;
  canonical: string;
  synonyms: readonly string[];
}

const ROLE_MATCHERS: readonly RoleMatcher[] = [
  { role: 'description', canonical: 'description', synonyms: ['desc'] },
  { role: 'total', canonical: 'total', synonyms: ['price', 'rcv'] },
  { role: 'quantity', canonical: 'quantity', synonyms: ['qty'] },
  { role: 'unit', canonical: 'unit', synonyms: [] },
];

export const REQUIRED_ROLES: readonly ColumnRole[] = ['description', 'total'];

export const DEFAULT_FUZZY_THRESHOLD = 70;

export function similarity(column: string, canonical: string): number {
  return ratio(column, canonical, { full_process: false });
}

function matches(column: string, matcher: RoleMatcher, threshold: number): boolean {
  return (
    similarity(column, matcher.canonical) > threshold ||
    matcher.synonyms.some((token) => column.includes(token))
  );
}

/**
 * Maps cleaned column names to semantic roles. Every column is tested
 * against every role; a later matching column replaces an earlier one.
 */
export function resolveColumns(
  columns: readonly string[],
  threshold = DEFAULT_FUZZY_THRESHOLD,
): ColumnResolution {
  const roles: ColumnRoleMap = {};

  for (const column of columns) {
    for (const matcher of ROLE_MATCHERS) {
      if (matches(column, matcher, threshold)) {
        roles[matcher.role] = column;
      }
    }
  }

  const { description, total } = roles;
  if (description !== undefined && total !== undefined) {
    return { complete: true, roles: { ...roles, description, total } };
  }

  return {
    complete: false,
    roles,
    missing: REQUIRED_ROLES.filter((role) => roles[role] === undefined),
  };
}
