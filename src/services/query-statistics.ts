import { Decimal } from 'decimal.js';
import type { LoanRecord, LoanRecordView, QueryStatistics } from '../types.js';

/**
 * Aggregates over a full match set. Sums are exact; values become JSON
 * numbers only at the end. An empty set yields an empty object.
 */
export function buildStatistics(records: readonly LoanRecord[]): QueryStatistics {
  const [first] = records;
  if (!first) return {};

  let servicerTotal = new Decimal(0);
  let fnmaTotal = new Decimal(0);
  let differenceTotal = new Decimal(0);
  let maxDifference = first.differenceAmount;
  let minDifference = first.differenceAmount;
  let mismatchCount = 0;

  for (const record of records) {
    servicerTotal = servicerTotal.plus(record.servicerLoanAmount);
    fnmaTotal = fnmaTotal.plus(record.fnmaLoanAmount);
    differenceTotal = differenceTotal.plus(record.differenceAmount);
    maxDifference = Decimal.max(maxDifference, record.differenceAmount);
    minDifference = Decimal.min(minDifference, record.differenceAmount);
    if (record.hasMismatch) mismatchCount++;
  }

  return {
    TotalAmount_Servicer: servicerTotal.toNumber(),
    TotalAmount_FNMA: fnmaTotal.toNumber(),
    TotalDifference: differenceTotal.toNumber(),
    AverageDifference: differenceTotal.dividedBy(records.length).toNumber(),
    MaxDifference: maxDifference.toNumber(),
    MinDifference: minDifference.toNumber(),
    MismatchCount: mismatchCount
  };
}

export function toRecordView(record: LoanRecord): LoanRecordView {
  return {
    loanId: record.loanId,
    borrowerName: record.borrowerName,
    servicerLoanAmount: record.servicerLoanAmount.toNumber(),
    fnmaLoanAmount: record.fnmaLoanAmount.toNumber(),
    differenceAmount: record.differenceAmount.toNumber(),
    reconciledStatus: record.reconciledStatus,
    hasMismatch: record.hasMismatch
  };
}
