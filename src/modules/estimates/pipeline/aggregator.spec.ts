import type { DelegatedItem } from '../interfaces';
import { computePayments, summarize, totalsByCategory } from './aggregator';

const item = (total: number, assignedTo: string, category: DelegatedItem['category'] = 'Other'): DelegatedItem => ({
  description: `${category} work`,
  total,
  category,
  assignedTo,
});

describe('summarize', () => {
  it('splits assigned and unassigned totals', () => {
    const summary = summarize([item(100, 'A', 'Roofing'), item(50, 'Unassigned')]);

    expect(summary).toEqual({
      grandTotal: 150,
      assignedTotal: 100,
      unassignedTotal: 50,
      categorizedPercentage: 50,
    });
  });

  it('rounds the categorized percentage', () => {
    const summary = summarize([
      item(1, 'Unassigned', 'Roofing'),
      item(1, 'Unassigned', 'Plumbing'),
      item(1, 'Unassigned'),
    ]);

    expect(summary.categorizedPercentage).toBe(67);
  });

  it('rounds a half percentage to the even neighbour', () => {
    const oneOfEight = [item(1, 'Unassigned', 'Roofing'), ...Array.from({ length: 7 }, () => item(1, 'Unassigned'))];
    const threeOfEight = [
      item(1, 'Unassigned', 'Roofing'),
      item(1, 'Unassigned', 'Plumbing'),
      item(1, 'Unassigned', 'Electrical'),
      ...Array.from({ length: 5 }, () => item(1, 'Unassigned')),
    ];

    expect(summarize(oneOfEight).categorizedPercentage).toBe(12);
    expect(summarize(threeOfEight).categorizedPercentage).toBe(38);
  });

  it('returns zeros for an empty estimate', () => {
    expect(summarize([])).toEqual({
      grandTotal: 0,
      assignedTotal: 0,
      unassignedTotal: 0,
      categorizedPercentage: 0,
    });
  });

  it('keeps credits as negative amounts', () => {
    expect(summarize([item(100, 'A'), item(-30, 'A')]).assignedTotal).toBe(70);
  });
});

describe('computePayments', () => {
  it('pays each contractor its fraction of the work assigned to it', () => {
    const payments = computePayments(
      [item(100, 'A', 'Roofing'), item(40, 'B', 'Plumbing'), item(50, 'Unassigned')],
      new Map([
        ['A', 0.85],
        ['B', 0.5],
        ['C', 0.9],
      ]),
    );

    expect(payments).toEqual([
      { contractor: 'A', payoutFraction: 0.85, assignedTotal: 100, payment: 85 },
      { contractor: 'B', payoutFraction: 0.5, assignedTotal: 40, payment: 20 },
      { contractor: 'C', payoutFraction: 0.9, assignedTotal: 0, payment: 0 },
    ]);
  });
});

describe('totalsByCategory', () => {
  it('lists populated categories in the fixed order', () => {
    const totals = totalsByCategory([
      item(20, 'Unassigned'),
      item(70, 'A', 'Plumbing'),
      item(30, 'A', 'Roofing'),
      item(5, 'A', 'Roofing'),
    ]);

    expect(totals).toEqual([
      { category: 'Roofing', count: 2, total: 35 },
      { category: 'Plumbing', count: 1, total: 70 },
      { category: 'Other', count: 1, total: 20 },
    ]);
  });
});
