import type {
  CompleteColumnRoleMap,
  EstimateReport,
  RawTable,
  RunConfig,
  TradeKeywords,
} from '../interfaces';
import { computePayments, summarize, totalsByCategory } from './aggregator';
import { categorizeItems } from './categorizer';
import { delegateItems } from './delegator';
import { formatCurrency, formatPercentage } from './format';
import { normalizeRows } from './row-normalizer';

/** Runs normalization through aggregation over an already resolved table. */
export function runPipeline(
  table: RawTable,
  columns: CompleteColumnRoleMap,
  config: RunConfig,
  keywords: TradeKeywords,
): EstimateReport {
  const { items, dropped } = normalizeRows(table.rows, columns);
  const categorizedItems = categorizeItems(items, keywords);
  const delegatedItems = delegateItems(categorizedItems, config.assignments);
  const summary = summarize(delegatedItems);

  return {
    columns,
    categorizedItems,
    delegatedItems,
    payments: computePayments(delegatedItems, config.payouts).map((line) => ({
      ...line,
      formattedPayment: formatCurrency(line.payment),
    })),
    categoryTotals: totalsByCategory(delegatedItems),
    summary,
    formatted: {
      grandTotal: formatCurrency(summary.grandTotal),
      assignedTotal: formatCurrency(summary.assignedTotal),
      unassignedTotal: formatCurrency(summary.unassignedTotal),
      categorizedPercentage: formatPercentage(summary.categorizedPercentage),
    },
    droppedRows: dropped,
  };
}
