import { QUERY_DEFAULTS } from '../constants.js';
import { errorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import { QueryType, type QueryRequest, type QueryResult } from '../types.js';
import { classifyQuery, toQueryText } from './query-rules.js';
import { buildStatistics, toRecordView } from './query-statistics.js';
import { recordStore, type RecordStore } from './record-store.js';

function clampNonNegative(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(0, Math.trunc(value));
}

/**
 * Runs free-text queries against the published snapshot.
 */
export class QueryEngine {
  constructor(private readonly store: RecordStore = recordStore) {}

  /**
   * Classify and run a query. Never throws: failures come back as
   * `success: false` with the error message.
   */
  execute(request: QueryRequest): QueryResult {
    const startedAt = Date.now();
    let queryType = QueryType.UNKNOWN;

    metrics.increment(MetricNames.QUERIES_TOTAL);

    try {
      const snapshot = this.store.snapshot();
      const text = toQueryText(request.query);
      const rule = classifyQuery(text);
      queryType = rule.type;

      const outcome = rule.run(text, snapshot);
      const matches = outcome.records;
      const skip = clampNonNegative(request.skip, 0);
      const limit = clampNonNegative(request.limit, QUERY_DEFAULTS.LIMIT);
      const statistics = buildStatistics(matches);
      const executionTimeMs = Date.now() - startedAt;

      metrics.histogram(MetricNames.QUERY_DURATION_MS, executionTimeMs);
      logger.debug('Query executed', {
        queryType,
        totalCount: matches.length,
        skip,
        limit,
        snapshotVersion: snapshot.version
      });

      return {
        success: true,
        message: outcome.message ?? `Found ${matches.length.toLocaleString('en-US')} records matching query`,
        data: matches.slice(skip, skip + limit).map(toRecordView),
        totalCount: matches.length,
        metadata: { queryType, executionTimeMs, statistics }
      };
    } catch (error) {
      metrics.increment(MetricNames.QUERIES_FAILED);
      logger.error('Query execution failed', { queryType, error: errorMessage(error) });

      return {
        success: false,
        message: `Query execution failed: ${errorMessage(error)}`,
        data: [],
        totalCount: 0,
        metadata: { queryType, executionTimeMs: Date.now() - startedAt, statistics: {} }
      };
    }
  }
}

export const queryEngine = new QueryEngine();
