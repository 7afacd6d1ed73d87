import { Decimal } from 'decimal.js';
import type { LoanRecord } from '../types.js';

export interface LoanFixture {
  loanId: string;
  borrowerName?: string;
  servicer?: string;
  fnma?: string;
  difference?: string;
  status?: string;
}

/**
 * Build a frozen loan record; the difference defaults to servicer - fnma.
 */
export function makeLoan({
  loanId,
  borrowerName = 'Test Borrower',
  servicer = '1000',
  fnma = '1000',
  difference,
  status = 'Reconciled'
}: LoanFixture): LoanRecord {
  const servicerLoanAmount = new Decimal(servicer);
  const fnmaLoanAmount = new Decimal(fnma);
  const differenceAmount = difference === undefined
    ? servicerLoanAmount.minus(fnmaLoanAmount)
    : new Decimal(difference);

  return Object.freeze({
    loanId,
    borrowerName,
    servicerLoanAmount,
    fnmaLoanAmount,
    differenceAmount,
    reconciledStatus: status,
    hasMismatch: !differenceAmount.isZero()
  });
}

/**
 * `count` records with ids LN-000001.. and a zero difference.
 */
export function makeLoans(count: number): LoanRecord[] {
  return Array.from({ length: count }, (_, index) =>
    makeLoan({ loanId: `LN-${String(index + 1).padStart(6, '0')}` })
  );
}

/**
 * Small mixed dataset used across query tests.
 */
export function sampleLoans(): LoanRecord[] {
  return [
    makeLoan({ loanId: 'LN-001234', borrowerName: 'John Smith', servicer: '200000', fnma: '194000', status: 'Pending' }),
    makeLoan({ loanId: 'LN-001235', borrowerName: 'Mary Johnson', servicer: '150000', fnma: '150000', status: 'Reconciled' }),
    makeLoan({ loanId: 'LN-001236', borrowerName: 'Robert Smithers', servicer: '99000', fnma: '105500', status: 'Unreconciled' }),
    makeLoan({ loanId: 'LN-001237', borrowerName: 'Linda Brown', servicer: '310000', fnma: '300000', status: 'Pending' }),
    makeLoan({ loanId: 'LN-001238', borrowerName: 'James Wilson', servicer: '80000', fnma: '79900', status: 'reconciled' }),
    makeLoan({ loanId: 'LN-001239', borrowerName: 'Patricia Smith', servicer: '120000', fnma: '120000', status: 'RECONCILED' }),
    makeLoan({ loanId: 'LN-001240', borrowerName: 'Michael Davis', servicer: '45000', fnma: '45050', status: 'Pending' }),
    makeLoan({ loanId: 'LN-001241', borrowerName: 'Susan Miller', servicer: '500000', fnma: '494999.50', status: 'Under Review' })
  ];
}
