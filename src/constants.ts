/**
 * Loan Reconciliation MCP Server Constants
 * Centralized configuration constants.
 */

import path from 'node:path';

// ===========================================
// Server Info
// ===========================================
export const SERVER_NAME = 'loan-recon-mcp-server';
export const SERVER_VERSION = '1.0.0';

// ===========================================
// Environment parsing
// ===========================================
const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// ===========================================
// Query Defaults
// ===========================================
export const QUERY_DEFAULTS = {
  // Page size when the caller gives no limit
  LIMIT: parseNumber(process.env.LOAN_QUERY_DEFAULT_LIMIT, 100),

  // N for top/bottom queries without a number
  RANKING_SIZE: 10,

  // Records returned alongside a dataset summary
  SUMMARY_SAMPLE_SIZE: 10,
};

// Status value that counts as reconciled (compared case-insensitively)
export const RECONCILED_STATUS = 'reconciled';

// Identifier-shaped token, e.g. LN-001234 or LN001234
export const LOAN_ID_PATTERN = /\bLN-?\d+\b/i;

// ===========================================
// Dataset Loading
// ===========================================
export type DuplicateKeyPolicy = 'last-wins' | 'reject';

const parseDuplicatePolicy = (value?: string): DuplicateKeyPolicy => {
  return value?.trim().toLowerCase() === 'reject' ? 'reject' : 'last-wins';
};

export const DATA_CONFIG = {
  // CSV export of the reconciliation workbook
  DATA_FILE: process.env.LOAN_DATA_FILE
    ? path.resolve(process.env.LOAN_DATA_FILE)
    : '',

  // What a snapshot build does when two rows share a loan ID
  DUPLICATE_KEYS: parseDuplicatePolicy(process.env.LOAN_DUPLICATE_KEYS),
};

/**
 * Accepted header spellings per record field, compared after lowercasing
 * and dropping spaces and underscores.
 */
export const COLUMN_ALIASES = {
  loanId: ['loanid', 'loannumber', 'id'],
  borrowerName: ['borrowername', 'borrower', 'customername'],
  servicerLoanAmount: ['servicerloanamount', 'servicer', 'serviceramount'],
  fnmaLoanAmount: ['fnmaloanamount', 'fnma', 'fnmaamount'],
  differenceAmount: ['differenceamount', 'difference'],
  reconciledStatus: ['reconciledstatus', 'status', 'reconciliationstatus'],
} as const;

// ===========================================
// Logging Configuration
// ===========================================
export const LOG_CONFIG = {
  // Default log level
  DEFAULT_LEVEL: process.env.LOAN_LOG_LEVEL || 'info',

  // Include stack traces in error logs
  INCLUDE_STACK_TRACE: true,
};
