/**
 * Loan query tools, with centralized error handling, logging and metrics.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, TextContent } from '@modelcontextprotocol/sdk/types.js';
import { LoanQueryError } from '../errors/index.js';
import { QueryLoansInputSchema, type QueryLoansInput } from '../schemas/tools.js';
import type { QueryEngine } from '../services/query-engine.js';
import type { RecordStore } from '../services/record-store.js';
import type { DatasetStatistics } from '../types.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';

export interface LoanToolDeps {
  store: RecordStore;
  engine: QueryEngine;
}

/**
 * Run a tool body with tracing and metrics. The result becomes a single
 * JSON text payload; a thrown error becomes an `isError` result.
 */
async function executeWithTracking<T>(
  toolName: string,
  params: Record<string, unknown>,
  handler: () => T | Promise<T>
): Promise<CallToolResult> {
  const traceId = logger.startToolCall(toolName, params);
  const timer = metrics.startTimer(MetricNames.TOOL_DURATION_MS);

  metrics.increment(MetricNames.TOOL_CALLS_TOTAL);

  try {
    const result = await handler();

    timer.stop();
    metrics.increment(MetricNames.TOOL_CALLS_SUCCESS);
    logger.endToolCall(traceId);

    const content: TextContent[] = [{ type: 'text', text: JSON.stringify(result, null, 2) }];
    return { content };
  } catch (error) {
    timer.stop();
    metrics.increment(MetricNames.TOOL_CALLS_FAILED);

    const toolError = LoanQueryError.fromError(error, traceId);
    logger.toolError(traceId, toolError);

    return toolError.toMCPResponse();
  }
}

export function getDatasetStatistics(store: RecordStore): DatasetStatistics {
  const builtAt = store.lastBuildTime();
  return {
    totalRecords: store.count(),
    lastLoadTime: builtAt ? builtAt.toISOString() : null,
    dataLoaded: store.count() > 0
  };
}

/**
 * Register the loan tools.
 */
export function registerLoanTools(server: McpServer, { store, engine }: LoanToolDeps): void {
  server.registerTool(
    'query_loans',
    {
      title: 'Query Loans',
      description: `Query the loan reconciliation dataset with a short text query.

Queries are matched by keywords, not parsed as sentences. Examples:
- "Find mismatches"
- "Show loans where difference > 5000"
- "List unreconciled loans"
- "Find loan LN-001234"
- "Search borrower John Smith"
- "Top 20 largest loans"
- "Summary"

The response carries the requested page of records, the total match count,
the detected query type and statistics over every matching record.`,
      inputSchema: QueryLoansInputSchema,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params: QueryLoansInput) => {
      return executeWithTracking('query_loans', params, () => engine.execute(params));
    }
  );

  server.registerTool(
    'get_statistics',
    {
      title: 'Get Dataset Statistics',
      description: 'Report how many loan records are loaded and when the dataset was last built.',
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async () => {
      return executeWithTracking('get_statistics', {}, () => getDatasetStatistics(store));
    }
  );
}
