import type { CategoryTotal, DelegatedItem, EstimateSummary } from '../interfaces';
import { CATEGORIES, UNASSIGNED } from '../interfaces';
import { roundHalfEven } from './rounding';

export interface PaymentLine {
  contractor: string;
  payoutFraction: number;
  assignedTotal: number;
  payment: number;
}

const sum = (items: readonly DelegatedItem[]) => items.reduce((acc, item) => acc + item.total, 0);

export function summarize(items: readonly DelegatedItem[]): EstimateSummary {
  const categorized = items.filter((item) => item.category !== 'Other').length;

  return {
    grandTotal: sum(items),
    assignedTotal: sum(items.filter((item) => item.assignedTo !== UNASSIGNED)),
    unassignedTotal: sum(items.filter((item) => item.assignedTo === UNASSIGNED)),
    categorizedPercentage: items.length === 0 ? 0 : roundHalfEven((categorized / items.length) * 100),
  };
}

export function computePayments(
  items: readonly DelegatedItem[],
  payouts: ReadonlyMap<string, number>,
): PaymentLine[] {
  return Array.from(payouts, ([contractor, payoutFraction]) => {
    const assignedTotal = sum(items.filter((item) => item.assignedTo === contractor));
    return { contractor, payoutFraction, assignedTotal, payment: assignedTotal * payoutFraction };
  });
}

export function totalsByCategory(items: readonly DelegatedItem[]): CategoryTotal[] {
  return CATEGORIES.map((category) => {
    const inCategory = items.filter((item) => item.category === category);
    return { category, count: inCategory.length, total: sum(inCategory) };
  }).filter((entry) => entry.count > 0);
}
