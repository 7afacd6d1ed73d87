/**
 * Ordered keyword rules for free-text loan queries.
 *
 * Rules are tried top to bottom and the first match wins. A query often
 * satisfies several predicates, so the array order is the precedence.
 */

import { Decimal } from 'decimal.js';
import { LOAN_ID_PATTERN, QUERY_DEFAULTS, RECONCILED_STATUS } from '../constants.js';
import { QueryType, type DatasetSnapshot, type LoanRecord } from '../types.js';

/**
 * Query text as typed, plus its lowercased form used for keyword tests.
 */
export interface QueryText {
  raw: string;
  normalized: string;
}

export interface RuleOutcome {
  records: readonly LoanRecord[];
  message?: string;
}

export interface QueryRule {
  type: QueryType;
  matches: (text: QueryText) => boolean;
  run: (text: QueryText, snapshot: DatasetSnapshot) => RuleOutcome;
}

export const UNKNOWN_QUERY_MESSAGE = [
  "I didn't understand that query. Try:",
  "- 'Find mismatches'",
  "- 'Show loans where difference > 5000'",
  "- 'List unreconciled loans'",
  "- 'Find loan LN-12345'",
  "- 'Search borrower John Smith'",
  "- 'Top 10 largest loans'",
  "- 'Give me a summary'"
].join('\n');

export const BORROWER_GUIDANCE_MESSAGE = 'Please specify a borrower name to search for.';

const COMPARATORS = ['>', '<', 'greater', 'less'];
const SIGN_WORDS = ['positive', 'negative'];
const LOAN_ID_KEYWORDS = new Set(['loan', 'loanid', 'id', 'number']);
const BORROWER_KEYWORD = /\b(?:borrower|customer|name)s?\b/i;
const BORROWER_FILLER = new Set([
  '', 'name', 'names', 'is', 'named', 'called', 'like', 'contains', 'containing', 'matching', 'of', 'with'
]);

export function toQueryText(query: string): QueryText {
  const raw = query.trim();
  return { raw, normalized: raw.toLowerCase() };
}

function hasAny(text: string, words: readonly string[]): boolean {
  return words.some(word => text.includes(word));
}

/**
 * First digit run with an optional decimal part, anywhere in the text.
 */
export function extractNumber(text: string): Decimal | null {
  const match = /\d+\.?\d*/.exec(text);
  return match ? new Decimal(match[0]) : null;
}

function rankingSize(text: string): number {
  const size = Math.trunc(extractNumber(text)?.toNumber() ?? 0);
  return size > 0 ? size : QUERY_DEFAULTS.RANKING_SIZE;
}

/**
 * The identifier-shaped token if present, otherwise the token after the
 * last loan/id/number keyword, otherwise the first token.
 */
export function extractLoanId(raw: string): string {
  const idMatch = LOAN_ID_PATTERN.exec(raw);
  if (idMatch) return idMatch[0];

  const tokens = raw.match(/[A-Za-z0-9-]+/g) ?? [];
  let keywordIndex = -1;
  tokens.forEach((token, index) => {
    if (LOAN_ID_KEYWORDS.has(token.toLowerCase())) keywordIndex = index;
  });
  return tokens[keywordIndex + 1] ?? tokens[0] ?? '';
}

/**
 * Text after the first borrower/customer/name keyword, without leading
 * filler words or surrounding quotes. Empty when nothing follows.
 */
export function extractBorrowerName(raw: string): string {
  const match = BORROWER_KEYWORD.exec(raw);
  if (!match) return '';

  const words = raw.slice(match.index + match[0].length).split(/\s+/);
  while (words.length > 0 && BORROWER_FILLER.has((words[0] ?? '').toLowerCase().replace(/[:=]/g, ''))) {
    words.shift();
  }
  return words.join(' ').replace(/^["']+|["'?.!]+$/g, '').trim();
}

function isReconciled(record: LoanRecord): boolean {
  return record.reconciledStatus.toLowerCase() === RECONCILED_STATUS;
}

function byAbsoluteDifference(a: LoanRecord, b: LoanRecord): number {
  return a.differenceAmount.abs().comparedTo(b.differenceAmount.abs());
}

function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}

function summaryMessage(snapshot: DatasetSnapshot): string {
  const total = snapshot.records.length;
  const mismatches = snapshot.mismatches.length;
  const reconciled = snapshot.records.filter(isReconciled).length;
  const percent = total === 0 ? 0 : (mismatches * 100) / total;

  return `Dataset Summary: ${formatCount(total)} total loans, ${formatCount(mismatches)} mismatches ` +
    `(${percent.toFixed(1)}%), ${formatCount(reconciled)} reconciled`;
}

/**
 * Rules in precedence order.
 */
export const QUERY_RULES: readonly QueryRule[] = [
  {
    // A bare "difference" means any mismatch; with a comparator or sign
    // word it is left to the more specific rules below.
    type: QueryType.FIND_MISMATCHES,
    matches: ({ normalized: t }) =>
      t.includes('mismatch') ||
      /\breconcile\b/.test(t) ||
      (t.includes('difference') && !hasAny(t, COMPARATORS) && !hasAny(t, SIGN_WORDS)),
    run: (_text, snapshot) => ({ records: snapshot.mismatches })
  },
  {
    type: QueryType.DIFFERENCE_GREATER_THAN,
    matches: ({ normalized: t }) => t.includes('difference') && (t.includes('>') || t.includes('greater')),
    run: ({ normalized }, snapshot) => {
      const threshold = extractNumber(normalized) ?? new Decimal(0);
      return { records: snapshot.records.filter(r => r.differenceAmount.greaterThan(threshold)) };
    }
  },
  {
    type: QueryType.DIFFERENCE_LESS_THAN,
    matches: ({ normalized: t }) => t.includes('difference') && (t.includes('<') || t.includes('less')),
    run: ({ normalized }, snapshot) => {
      const threshold = extractNumber(normalized) ?? new Decimal(0);
      return { records: snapshot.records.filter(r => r.differenceAmount.lessThan(threshold)) };
    }
  },
  {
    type: QueryType.RECONCILED,
    matches: ({ normalized: t }) => t.includes('reconciled') && !t.includes('un') && !t.includes('not'),
    run: (_text, snapshot) => ({ records: snapshot.records.filter(isReconciled) })
  },
  {
    type: QueryType.UNRECONCILED,
    matches: ({ normalized: t }) => hasAny(t, ['unreconciled', 'not reconciled', 'pending']),
    run: (_text, snapshot) => ({ records: snapshot.records.filter(r => !isReconciled(r)) })
  },
  {
    type: QueryType.LOAN_BY_ID,
    matches: ({ raw, normalized: t }) =>
      LOAN_ID_PATTERN.test(raw) ||
      /\bloan\s*id\b/.test(t) ||
      (/\bloan\b/.test(t) && /\b(?:id|number)\b/.test(t)),
    run: ({ raw }, snapshot) => {
      const loanId = extractLoanId(raw);
      const record = snapshot.byKey.get(loanId) ?? snapshot.byKey.get(loanId.toUpperCase());
      return record
        ? { records: [record] }
        : { records: [], message: `No loan found with ID "${loanId}"` };
    }
  },
  {
    type: QueryType.SEARCH_BY_BORROWER,
    matches: ({ normalized: t }) => hasAny(t, ['borrower', 'customer', 'name']),
    run: ({ raw }, snapshot) => {
      const fragment = extractBorrowerName(raw).toLowerCase();
      if (!fragment) {
        return { records: [], message: BORROWER_GUIDANCE_MESSAGE };
      }
      return { records: snapshot.records.filter(r => r.borrowerName.toLowerCase().includes(fragment)) };
    }
  },
  {
    type: QueryType.TOP_DIFFERENCES,
    matches: ({ normalized: t }) => hasAny(t, ['top', 'highest', 'largest']),
    run: ({ normalized }, snapshot) => ({
      records: [...snapshot.records]
        .sort((a, b) => byAbsoluteDifference(b, a))
        .slice(0, rankingSize(normalized))
    })
  },
  {
    type: QueryType.BOTTOM_DIFFERENCES,
    matches: ({ normalized: t }) => hasAny(t, ['bottom', 'lowest', 'smallest']),
    run: ({ normalized }, snapshot) => ({
      records: [...snapshot.mismatches]
        .sort(byAbsoluteDifference)
        .slice(0, rankingSize(normalized))
    })
  },
  {
    type: QueryType.POSITIVE_DIFFERENCES,
    matches: ({ normalized: t }) => t.includes('positive') && t.includes('difference'),
    run: (_text, snapshot) => ({ records: snapshot.records.filter(r => r.differenceAmount.greaterThan(0)) })
  },
  {
    type: QueryType.NEGATIVE_DIFFERENCES,
    matches: ({ normalized: t }) => t.includes('negative') && t.includes('difference'),
    run: (_text, snapshot) => ({ records: snapshot.records.filter(r => r.differenceAmount.lessThan(0)) })
  },
  {
    type: QueryType.SERVICER_GREATER,
    matches: ({ normalized: t }) => t.includes('servicer') && hasAny(t, ['greater', 'more']),
    run: (_text, snapshot) => ({
      records: snapshot.records.filter(r => r.servicerLoanAmount.greaterThan(r.fnmaLoanAmount))
    })
  },
  {
    type: QueryType.FNMA_GREATER,
    matches: ({ normalized: t }) => t.includes('fnma') && hasAny(t, ['greater', 'more']),
    run: (_text, snapshot) => ({
      records: snapshot.records.filter(r => r.fnmaLoanAmount.greaterThan(r.servicerLoanAmount))
    })
  },
  {
    type: QueryType.COUNT,
    matches: ({ normalized: t }) => hasAny(t, ['count', 'how many', 'total']),
    run: (_text, snapshot) => ({
      records: snapshot.records,
      message: `Total count: ${formatCount(snapshot.records.length)} records`
    })
  },
  {
    type: QueryType.LIST_ALL,
    matches: ({ normalized: t }) => hasAny(t, ['all', 'list', 'show', 'everything']),
    run: (_text, snapshot) => ({ records: snapshot.records })
  },
  {
    type: QueryType.SUMMARY,
    matches: ({ normalized: t }) => hasAny(t, ['summary', 'overview', 'report']),
    run: (_text, snapshot) => ({
      records: snapshot.records.slice(0, QUERY_DEFAULTS.SUMMARY_SAMPLE_SIZE),
      message: summaryMessage(snapshot)
    })
  }
];

export const UNKNOWN_RULE: QueryRule = {
  type: QueryType.UNKNOWN,
  matches: () => true,
  run: () => ({ records: [], message: UNKNOWN_QUERY_MESSAGE })
};

/**
 * First rule whose predicate accepts the text.
 */
export function classifyQuery(text: QueryText): QueryRule {
  return QUERY_RULES.find(rule => rule.matches(text)) ?? UNKNOWN_RULE;
}
