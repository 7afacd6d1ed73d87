import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { COLUMN_ALIASES } from '../constants.js';
import { Errors, errorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import type { LoadResult, LoanRecord, RowError } from '../types.js';

type LoanField = keyof typeof COLUMN_ALIASES;

const LOAN_FIELDS: readonly LoanField[] = [
  'loanId',
  'borrowerName',
  'servicerLoanAmount',
  'fnmaLoanAmount',
  'differenceAmount',
  'reconciledStatus'
];

// A blank or missing difference is derived from the two amounts.
const OPTIONAL_FIELDS: ReadonlySet<LoanField> = new Set<LoanField>(['differenceAmount']);

const CsvTableSchema = z.array(z.array(z.string()));

/**
 * Parse a currency cell: "$1,234.50", "-20", "(15.00)".
 */
function parseAmount(value: string, ctx: z.RefinementCtx): Decimal {
  const cleaned = value.trim().replace(/[$,\s]/g, '');
  const negative = /^\(.*\)$/.test(cleaned);
  const digits = negative ? `-${cleaned.slice(1, -1)}` : cleaned;

  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(digits)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an amount: "${value}"` });
    return z.NEVER;
  }
  return new Decimal(digits);
}

const AmountSchema = z.string().transform(parseAmount);

const OptionalAmountSchema = z.string().transform((value, ctx) =>
  value.trim() === '' ? null : parseAmount(value, ctx)
);

const LoanRowSchema = z.object({
  loanId: z.string().trim().min(1, 'LoanID is required'),
  borrowerName: z.string().trim(),
  servicerLoanAmount: AmountSchema,
  fnmaLoanAmount: AmountSchema,
  differenceAmount: OptionalAmountSchema,
  reconciledStatus: z.string().trim()
});

type LoanRow = z.infer<typeof LoanRowSchema>;

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_]/g, '');
}

/**
 * Map each record field to its column index. A missing required column
 * fails the whole load.
 */
function resolveColumns(header: readonly string[], source: string): Map<LoanField, number> {
  const normalized = header.map(normalizeHeader);
  const columns = new Map<LoanField, number>();

  for (const field of LOAN_FIELDS) {
    const aliases: readonly string[] = COLUMN_ALIASES[field];
    const index = normalized.findIndex(name => aliases.includes(name));
    if (index !== -1) {
      columns.set(field, index);
    }
  }

  const missing = LOAN_FIELDS.filter(field => !OPTIONAL_FIELDS.has(field) && !columns.has(field));
  if (missing.length > 0) {
    throw Errors.loadFailed(source, `missing column(s): ${missing.join(', ')}`);
  }
  return columns;
}

function toLoanRecord(row: LoanRow): LoanRecord {
  const differenceAmount = row.differenceAmount ?? row.servicerLoanAmount.minus(row.fnmaLoanAmount);

  return Object.freeze({
    loanId: row.loanId,
    borrowerName: row.borrowerName,
    servicerLoanAmount: row.servicerLoanAmount,
    fnmaLoanAmount: row.fnmaLoanAmount,
    differenceAmount,
    reconciledStatus: row.reconciledStatus,
    hasMismatch: !differenceAmount.isZero()
  });
}

/**
 * Parse CSV text into loan records.
 *
 * Malformed rows are skipped and reported in `rowErrors`. Throws a
 * LOAD_FAILED error when the text cannot be parsed at all or no row is
 * usable.
 */
export function parseLoanCsv(content: string, source: string = 'input'): LoadResult {
  let table: string[][];
  try {
    table = CsvTableSchema.parse(parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    }));
  } catch (error) {
    throw Errors.loadFailed(source, errorMessage(error));
  }

  const [header, ...rows] = table;
  if (!header || rows.length === 0) {
    throw Errors.loadFailed(source, 'no data rows');
  }

  const columns = resolveColumns(header, source);
  const records: LoanRecord[] = [];
  const rowErrors: RowError[] = [];

  rows.forEach((cells, index) => {
    // Row 1 is the header.
    const rowNumber = index + 2;
    const cell = (field: LoanField): string => {
      const column = columns.get(field);
      return column === undefined ? '' : cells[column] ?? '';
    };

    const parsed = LoanRowSchema.safeParse({
      loanId: cell('loanId'),
      borrowerName: cell('borrowerName'),
      servicerLoanAmount: cell('servicerLoanAmount'),
      fnmaLoanAmount: cell('fnmaLoanAmount'),
      differenceAmount: cell('differenceAmount'),
      reconciledStatus: cell('reconciledStatus')
    });
    if (!parsed.success) {
      const message = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      rowErrors.push({ row: rowNumber, message });
      logger.warn('Skipping malformed row', { source, row: rowNumber, error: message });
      return;
    }
    records.push(toLoanRecord(parsed.data));
  });

  metrics.increment(MetricNames.ROWS_SKIPPED, rowErrors.length);

  if (records.length === 0) {
    throw Errors.loadFailed(source, `no valid rows (${rowErrors.length} rejected)`);
  }

  return { records, rowErrors, totalRows: rows.length };
}

/**
 * Read and parse a CSV export of the reconciliation workbook.
 */
export async function loadLoanRecords(filePath: string): Promise<LoadResult> {
  const timer = metrics.startTimer(MetricNames.LOAD_DURATION_MS);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw Errors.loadFailed(filePath, errorMessage(error));
  }

  const result = parseLoanCsv(content, filePath);

  logger.info('Loan data loaded', {
    file: filePath,
    records: result.records.length,
    skippedRows: result.rowErrors.length
  });
  logger.performance('load loan data', timer.stop(), { file: filePath });

  return result;
}
