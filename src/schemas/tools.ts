/**
 * Zod schemas for the loan query tools
 */

import { z } from 'zod';

/**
 * Free-text loan query with optional paging
 */
export const QueryLoansInputSchema = z.object({
  query: z.string()
    .describe('Query text, e.g. "find mismatches" or "show loans where difference > 5000"'),

  limit: z.number()
    .int()
    .optional()
    .describe('Max records to return (default: 100)'),

  skip: z.number()
    .int()
    .optional()
    .describe('Records to skip before the page starts (default: 0)')
}).strict();

export type QueryLoansInput = z.infer<typeof QueryLoansInputSchema>;
