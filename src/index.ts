#!/usr/bin/env node
/**
 * Loan Reconciliation MCP Server
 *
 * Loads a CSV export of loan reconciliation records into memory and answers
 * keyword-driven queries over a newline-delimited JSON-RPC session on
 * stdin/stdout.
 *
 * Tools:
 * - query_loans: free-text query with paging and statistics
 * - get_statistics: dataset size and last load time
 *
 * Send SIGHUP to reload the data file without restarting.
 */

import path from 'node:path';
import { DATA_CONFIG, SERVER_NAME, SERVER_VERSION } from './constants.js';
import { errorMessage } from './errors/index.js';
import { createMcpServer } from './server.js';
import { loadLoanRecords } from './services/loan-loader.js';
import { recordStore } from './services/record-store.js';
import { LineTransport } from './transport/line-transport.js';
import { logger, LogLevel } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

/**
 * Print usage instructions
 */
function printUsage(): void {
  console.error(`
${SERVER_NAME} v${SERVER_VERSION}
Keyword queries over loan reconciliation records, served over stdio

USAGE:
  node dist/index.js [OPTIONS] [DATA_FILE]

OPTIONS:
  --file=PATH      CSV file to load (or LOAN_DATA_FILE)
  --debug          Enable debug logging
  --help           Show this help message

ENVIRONMENT:
  LOAN_DATA_FILE             CSV file to load when no path is given
  LOAN_DUPLICATE_KEYS        last-wins (default) or reject
  LOAN_LOG_LEVEL             debug, info, warn or error
  LOAN_QUERY_DEFAULT_LIMIT   Page size when a query gives no limit (default: 100)

CSV COLUMNS:
  LoanID, BorrowerName, Servicer_LoanAmount, FNMA_LoanAmount,
  DifferenceAmount (optional), ReconciledStatus

MCP CLIENT CONFIG:
  {
    "mcpServers": {
      "loans": {
        "command": "node",
        "args": ["path/to/loan-recon-mcp-server/dist/index.js", "loans.csv"]
      }
    }
  }
`);
}

function resolveDataFile(args: string[]): string {
  const fileArg = args.find(a => a.startsWith('--file='))?.slice('--file='.length)
    ?? args.find(a => !a.startsWith('--'));
  return fileArg ? path.resolve(fileArg) : DATA_CONFIG.DATA_FILE;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  if (args.includes('--debug')) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const dataFile = resolveDataFile(args);
  if (!dataFile) {
    console.error('No data file given. Pass a CSV path or set LOAN_DATA_FILE.');
    printUsage();
    process.exit(1);
  }

  logger.info(`${SERVER_NAME} v${SERVER_VERSION} starting`, {
    dataFile,
    duplicateKeys: DATA_CONFIG.DUPLICATE_KEYS,
    nodeVersion: process.version,
    platform: process.platform
  });

  // The first snapshot is published before any request is read.
  const loaded = await loadLoanRecords(dataFile);
  recordStore.build(loaded.records);

  const server = createMcpServer();
  const transport = new LineTransport();
  let stopping: Promise<void> | undefined;

  const shutdown = (reason: string): Promise<void> => {
    stopping ??= (async () => {
      await server.close();
      logger.info('Final metrics', metrics.getAll());
      logger.serverStopped(reason);
      process.exit(0);
    })();
    return stopping;
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  process.on('SIGHUP', () => {
    logger.info('Reloading loan data', { dataFile });
    recordStore
      .reload(async () => (await loadLoanRecords(dataFile)).records)
      .catch(error => {
        logger.error('Reload failed; keeping the current snapshot', { error: errorMessage(error) });
      });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack
    });
    onSignal('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  await server.connect(transport);
  logger.serverStarted('stdio', {
    version: SERVER_VERSION,
    records: recordStore.count(),
    skippedRows: loaded.rowErrors.length
  });

  await transport.finished();
  await shutdown('input closed');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
