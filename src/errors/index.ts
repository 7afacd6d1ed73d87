/**
 * Loan Reconciliation MCP Server - Structured error handling
 *
 * Provides consistent error types and codes for diagnostics.
 */

import type { CallToolResult, TextContent } from '@modelcontextprotocol/sdk/types.js';

/**
 * Error code enumeration
 */
export enum ErrorCode {
  // Dataset errors (1xxx)
  LOAD_FAILED = 1001,
  DUPLICATE_LOAN_ID = 1002,
  DATA_NOT_LOADED = 1003,

  // System errors (9xxx)
  INTERNAL_ERROR = 9001,
}

/**
 * Loan server error type
 */
export class LoanQueryError extends Error {
  public readonly timestamp: Date;
  public readonly traceId?: string;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    traceId?: string
  ) {
    super(message);
    this.name = 'LoanQueryError';
    this.timestamp = new Date();
    this.traceId = traceId;

    // Preserve the prototype chain for instanceof checks.
    Object.setPrototypeOf(this, LoanQueryError.prototype);
  }

  /**
   * Serialize error details to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      traceId: this.traceId
    };
  }

  /**
   * Convert to the MCP tool response shape.
   */
  toMCPResponse(): CallToolResult {
    const content: TextContent[] = [{
      type: 'text',
      text: JSON.stringify(this.toJSON(), null, 2)
    }];

    return {
      content,
      isError: true
    };
  }

  /**
   * Wrap an unknown error as a LoanQueryError.
   */
  static fromError(error: unknown, traceId?: string): LoanQueryError {
    if (error instanceof LoanQueryError) {
      return error;
    }

    if (error instanceof Error) {
      return new LoanQueryError(
        ErrorCode.INTERNAL_ERROR,
        error.message,
        { originalError: error.name },
        traceId
      );
    }

    return new LoanQueryError(
      ErrorCode.INTERNAL_ERROR,
      String(error),
      undefined,
      traceId
    );
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper factory functions for common errors.
 */
export const Errors = {
  loadFailed: (source: string, reason: string) =>
    new LoanQueryError(ErrorCode.LOAD_FAILED, `Failed to load loan data from ${source}: ${reason}`, { source, reason }),

  duplicateLoanId: (loanId: string) =>
    new LoanQueryError(ErrorCode.DUPLICATE_LOAN_ID, `Duplicate loan ID "${loanId}"`, { loanId }),

  notLoaded: () =>
    new LoanQueryError(ErrorCode.DATA_NOT_LOADED, 'No loan data has been loaded'),
};
