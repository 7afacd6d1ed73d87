import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { queryEngine } from './services/query-engine.js';
import { recordStore } from './services/record-store.js';
import { registerLoanTools, type LoanToolDeps } from './tools/loan-tools.js';

/**
 * Create and configure the MCP server. `initialize`, `ping` and unknown
 * method errors are answered by the SDK.
 */
export function createMcpServer(
  deps: LoanToolDeps = { store: recordStore, engine: queryEngine }
): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      instructions: 'Use query_loans for keyword queries over loan reconciliation records and get_statistics for dataset status.'
    }
  );

  registerLoanTools(server, deps);

  return server;
}
