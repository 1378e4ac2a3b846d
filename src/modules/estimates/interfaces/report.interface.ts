import type {
  CategorizedItem,
  Category,
  ColumnRoleMap,
  CompleteColumnRoleMap,
  DelegatedItem,
  RawTable,
} from './estimate.interface';

export interface ContractorPayment {
  contractor: string;
  payoutFraction: number;
  assignedTotal: number;
  payment: number;
  formattedPayment: string;
}

export interface CategoryTotal {
  category: Category;
  count: number;
  total: number;
}

export interface EstimateSummary {
  grandTotal: number;
  assignedTotal: number;
  unassignedTotal: number;
  categorizedPercentage: number;
}

export interface EstimateReport {
  columns: CompleteColumnRoleMap;
  categorizedItems: CategorizedItem[];
  delegatedItems: DelegatedItem[];
  payments: ContractorPayment[];
  categoryTotals: CategoryTotal[];
  summary: EstimateSummary;
  formatted: {
    grandTotal: string;
    assignedTotal: string;
    unassignedTotal: string;
    categorizedPercentage: string;
  };
  droppedRows: number;
}

export interface CompletedAnalysis {
  status: 'completed';
  report: EstimateReport;
}

export interface ColumnSelectionRequest {
  status: 'needs-columns';
  message: string;
  columns: string[];
  detected: ColumnRoleMap;
  table: RawTable;
}

export type AnalysisOutcome = CompletedAnalysis | ColumnSelectionRequest;
