import { beforeEach, describe, it, expect } from 'vitest';
import { makeLoan, makeLoans, sampleLoans } from '../testing/fixtures.js';
import { QueryType } from '../types.js';
import { QueryEngine } from './query-engine.js';
import { BORROWER_GUIDANCE_MESSAGE, UNKNOWN_QUERY_MESSAGE } from './query-rules.js';
import { RecordStore } from './record-store.js';

const idsOf = (result: { data: { loanId: string }[] }) => result.data.map(r => r.loanId);

describe('QueryEngine', () => {
  let store: RecordStore;
  let engine: QueryEngine;

  beforeEach(() => {
    store = new RecordStore();
    store.build(sampleLoans());
    engine = new QueryEngine(store);
  });

  describe('lookups', () => {
    it('finds a loan by ID', () => {
      const result = engine.execute({ query: 'Find loan LN-001234' });

      expect(result.success).toBe(true);
      expect(result.totalCount).toBe(1);
      expect(result.metadata.queryType).toBe(QueryType.LOAN_BY_ID);
      expect(result.data).toEqual([{
        loanId: 'LN-001234',
        borrowerName: 'John Smith',
        servicerLoanAmount: 200000,
        fnmaLoanAmount: 194000,
        differenceAmount: 6000,
        reconciledStatus: 'Pending',
        hasMismatch: true
      }]);
    });

    it('matches a lowercase identifier against the uppercase key', () => {
      const result = engine.execute({ query: 'find loan ln-001236' });

      expect(idsOf(result)).toEqual(['LN-001236']);
    });

    it('reports a missing loan as a successful empty result', () => {
      const result = engine.execute({ query: 'loan number 001235' });

      expect(result.success).toBe(true);
      expect(result.totalCount).toBe(0);
      expect(result.message).toBe('No loan found with ID "001235"');
      expect(result.metadata.statistics).toEqual({});
    });

    it('searches borrowers by case-insensitive substring', () => {
      const result = engine.execute({ query: 'customer named smith' });

      expect(idsOf(result)).toEqual(['LN-001234', 'LN-001236', 'LN-001239']);
    });

    it('asks for a name when the borrower search has none', () => {
      const result = engine.execute({ query: 'search by borrower' });

      expect(result.success).toBe(true);
      expect(result.totalCount).toBe(0);
      expect(result.message).toBe(BORROWER_GUIDANCE_MESSAGE);
    });
  });

  describe('filters', () => {
    it('finds every mismatch', () => {
      const result = engine.execute({ query: 'Find mismatches' });

      expect(result.totalCount).toBe(6);
      expect(result.message).toBe('Found 6 records matching query');
      expect(result.data.every(r => r.hasMismatch)).toBe(true);
    });

    it('filters by difference above a threshold with statistics over all matches', () => {
      const result = engine.execute({ query: 'Show loans where difference > 5000', limit: 1 });

      expect(result.totalCount).toBe(3);
      expect(idsOf(result)).toEqual(['LN-001234']);
      expect(result.metadata.queryType).toBe(QueryType.DIFFERENCE_GREATER_THAN);

      const stats = result.metadata.statistics;
      expect(stats.TotalAmount_Servicer).toBe(1010000);
      expect(stats.TotalAmount_FNMA).toBe(988999.5);
      expect(stats.TotalDifference).toBe(21000.5);
      expect(stats.AverageDifference).toBeCloseTo(7000.1667, 4);
      expect(stats.MaxDifference).toBe(10000);
      expect(stats.MinDifference).toBe(5000.5);
      expect(stats.MismatchCount).toBe(3);
    });

    it('reads the threshold from a column-style query', () => {
      const result = engine.execute({ query: 'Show loans where DifferenceAmount > 5000' });

      expect(result.metadata.queryType).toBe(QueryType.DIFFERENCE_GREATER_THAN);
      expect(result.totalCount).toBe(3);
    });

    it('treats a query naming both mismatches and reconciled loans as a mismatch query', () => {
      const result = engine.execute({ query: 'reconciled mismatches' });

      expect(result.metadata.queryType).toBe(QueryType.FIND_MISMATCHES);
      expect(result.totalCount).toBe(6);
    });

    it('filters by difference below a threshold', () => {
      const result = engine.execute({ query: 'difference less than 100' });

      expect(idsOf(result)).toEqual(['LN-001235', 'LN-001236', 'LN-001239', 'LN-001240']);
    });

    it('compares statuses case-insensitively', () => {
      expect(idsOf(engine.execute({ query: 'Show reconciled loans' })))
        .toEqual(['LN-001235', 'LN-001238', 'LN-001239']);
      expect(idsOf(engine.execute({ query: 'List unreconciled loans' })))
        .toEqual(['LN-001234', 'LN-001236', 'LN-001237', 'LN-001240', 'LN-001241']);
    });

    it('splits differences by sign', () => {
      expect(idsOf(engine.execute({ query: 'positive differences' })))
        .toEqual(['LN-001234', 'LN-001237', 'LN-001238', 'LN-001241']);
      expect(idsOf(engine.execute({ query: 'negative differences' })))
        .toEqual(['LN-001236', 'LN-001240']);
    });

    it('compares the two amounts', () => {
      expect(idsOf(engine.execute({ query: 'servicer greater than fnma' })))
        .toEqual(['LN-001234', 'LN-001237', 'LN-001238', 'LN-001241']);
      expect(idsOf(engine.execute({ query: 'where fnma is greater' })))
        .toEqual(['LN-001236', 'LN-001240']);
    });
  });

  describe('rankings', () => {
    it('orders the largest absolute differences first', () => {
      const result = engine.execute({ query: 'top 3 loans' });

      expect(idsOf(result)).toEqual(['LN-001237', 'LN-001236', 'LN-001234']);
    });

    it('orders the smallest non-zero differences first', () => {
      const result = engine.execute({ query: 'bottom 3 loans' });

      expect(idsOf(result)).toEqual(['LN-001240', 'LN-001238', 'LN-001241']);
    });

    it('returns the mismatch subset for a ranking word next to "difference"', () => {
      const result = engine.execute({ query: 'top 3 differences' });

      expect(result.metadata.queryType).toBe(QueryType.FIND_MISMATCHES);
      expect(result.totalCount).toBe(6);
    });

    it('defaults the ranking size to ten', () => {
      store.build(Array.from({ length: 15 }, (_, i) =>
        makeLoan({ loanId: `LN-${i + 1}`, servicer: String(1000 + i) })
      ));

      const result = engine.execute({ query: 'largest loans' });

      expect(result.totalCount).toBe(10);
      expect(result.data[0]?.loanId).toBe('LN-15');
    });
  });

  describe('dataset-wide queries', () => {
    it('counts every record', () => {
      const result = engine.execute({ query: 'how many loans' });

      expect(result.totalCount).toBe(8);
      expect(result.message).toBe('Total count: 8 records');
    });

    it('summarizes the dataset', () => {
      const result = engine.execute({ query: 'Give me a summary' });

      expect(result.message).toBe('Dataset Summary: 8 total loans, 6 mismatches (75.0%), 3 reconciled');
      expect(result.totalCount).toBe(8);
    });

    it('computes statistics over the whole dataset', () => {
      const stats = engine.execute({ query: 'list everything' }).metadata.statistics;

      expect(stats).toEqual({
        TotalAmount_Servicer: 1504000,
        TotalAmount_FNMA: 1489449.5,
        TotalDifference: 14550.5,
        AverageDifference: 1818.8125,
        MaxDifference: 10000,
        MinDifference: -6500,
        MismatchCount: 6
      });
    });

    it('keeps sums exact across many small amounts', () => {
      store.build(Array.from({ length: 10 }, (_, i) =>
        makeLoan({ loanId: `LN-${i}`, servicer: '0.1', fnma: '0' })
      ));

      const stats = engine.execute({ query: 'list all' }).metadata.statistics;

      expect(stats.TotalDifference).toBe(1);
      expect(stats.TotalAmount_Servicer).toBe(1);
    });
  });

  describe('pagination', () => {
    it('returns the first page of a large dataset with the full count', () => {
      store.build(makeLoans(80_000));

      const result = engine.execute({ query: 'list all loans', limit: 10 });

      expect(result.data).toHaveLength(10);
      expect(result.totalCount).toBe(80_000);
      expect(result.message).toBe('Found 80,000 records matching query');
      expect(result.data[0]?.loanId).toBe('LN-000001');
    });

    it('applies skip before limit', () => {
      const result = engine.execute({ query: 'list all', skip: 2, limit: 3 });

      expect(idsOf(result)).toEqual(['LN-001236', 'LN-001237', 'LN-001238']);
      expect(result.totalCount).toBe(8);
    });

    it('treats a negative skip as zero', () => {
      const result = engine.execute({ query: 'list all', skip: -5, limit: 2 });

      expect(idsOf(result)).toEqual(['LN-001234', 'LN-001235']);
    });

    it('returns an empty page past the end', () => {
      const result = engine.execute({ query: 'list all', skip: 8 });

      expect(result.data).toEqual([]);
      expect(result.totalCount).toBe(8);
      expect(result.metadata.statistics.MismatchCount).toBe(6);
    });

    it('returns no rows for a zero limit', () => {
      const result = engine.execute({ query: 'list all', limit: 0 });

      expect(result.data).toEqual([]);
      expect(result.totalCount).toBe(8);
    });
  });

  describe('unrecognized and failed queries', () => {
    it('answers an unknown query with examples', () => {
      const result = engine.execute({ query: 'hello there' });

      expect(result.success).toBe(true);
      expect(result.totalCount).toBe(0);
      expect(result.data).toEqual([]);
      expect(result.message).toBe(UNKNOWN_QUERY_MESSAGE);
      expect(result.metadata.queryType).toBe(QueryType.UNKNOWN);
    });

    it('reports a query before any data is loaded as a failure', () => {
      const result = new QueryEngine(new RecordStore()).execute({ query: 'Find mismatches' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Query execution failed: No loan data has been loaded');
      expect(result.data).toEqual([]);
      expect(result.totalCount).toBe(0);
      expect(result.metadata.statistics).toEqual({});
    });

    it('gives the same answer for the same query and snapshot', () => {
      const first = engine.execute({ query: 'top 5 loans', skip: 1, limit: 2 });
      const second = engine.execute({ query: 'top 5 loans', skip: 1, limit: 2 });

      expect(second.data).toEqual(first.data);
      expect(second.metadata.statistics).toEqual(first.metadata.statistics);
    });
  });
});
