/**
 * Loan Reconciliation MCP Server Type Definitions
 */

import type { Decimal } from 'decimal.js';

/**
 * One reconciliation row, as loaded. Frozen after loading.
 */
export interface LoanRecord {
  readonly loanId: string;
  readonly borrowerName: string;
  readonly servicerLoanAmount: Decimal;
  readonly fnmaLoanAmount: Decimal;
  readonly differenceAmount: Decimal;
  readonly reconciledStatus: string;
  readonly hasMismatch: boolean;
}

/**
 * JSON shape of a record on the wire
 */
export interface LoanRecordView {
  loanId: string;
  borrowerName: string;
  servicerLoanAmount: number;
  fnmaLoanAmount: number;
  differenceAmount: number;
  reconciledStatus: string;
  hasMismatch: boolean;
}

/**
 * Published dataset plus its indices. Every field comes from one build.
 */
export interface DatasetSnapshot {
  readonly version: number;
  readonly records: readonly LoanRecord[];
  readonly byKey: ReadonlyMap<string, LoanRecord>;
  readonly mismatches: readonly LoanRecord[];
  readonly builtAt: Date;
  readonly duplicateKeys: number;
}

/**
 * Query categories, in no particular order (precedence lives in query-rules)
 */
export enum QueryType {
  FIND_MISMATCHES = 'FindMismatches',
  DIFFERENCE_GREATER_THAN = 'DifferenceGreaterThan',
  DIFFERENCE_LESS_THAN = 'DifferenceLessThan',
  RECONCILED = 'ReconciledLoans',
  UNRECONCILED = 'UnreconciledLoans',
  LOAN_BY_ID = 'LoanByID',
  SEARCH_BY_BORROWER = 'SearchByBorrower',
  TOP_DIFFERENCES = 'TopDifferences',
  BOTTOM_DIFFERENCES = 'BottomDifferences',
  POSITIVE_DIFFERENCES = 'PositiveDifferences',
  NEGATIVE_DIFFERENCES = 'NegativeDifferences',
  SERVICER_GREATER = 'ServicerGreaterThanFNMA',
  FNMA_GREATER = 'FNMAGreaterThanServicer',
  COUNT = 'Count',
  LIST_ALL = 'ListAll',
  SUMMARY = 'Summary',
  UNKNOWN = 'Unknown'
}

export interface QueryRequest {
  query: string;
  limit?: number;
  skip?: number;
}

/**
 * Aggregates over a full match set. Empty when nothing matched.
 */
export interface QueryStatistics {
  TotalAmount_Servicer?: number;
  TotalAmount_FNMA?: number;
  TotalDifference?: number;
  AverageDifference?: number;
  MaxDifference?: number;
  MinDifference?: number;
  MismatchCount?: number;
}

export interface QueryMetadata {
  queryType: QueryType;
  executionTimeMs: number;
  statistics: QueryStatistics;
}

export interface QueryResult {
  success: boolean;
  message: string;
  data: LoanRecordView[];
  totalCount: number;
  metadata: QueryMetadata;
}

/**
 * Dataset summary returned by the get_statistics tool
 */
export interface DatasetStatistics {
  totalRecords: number;
  lastLoadTime: string | null;
  dataLoaded: boolean;
}

/**
 * A row the loader skipped
 */
export interface RowError {
  row: number;
  message: string;
}

export interface LoadResult {
  records: LoanRecord[];
  rowErrors: RowError[];
  totalRows: number;
}
