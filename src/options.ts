import { z } from 'zod';
import { InvalidParameterError } from './errors.js';
import type { Logger } from './logger.js';

export const FilterOptionsSchema = z.object({
  /** Expected number of items (n) */
  capacity: z
    .number({ invalid_type_error: 'capacity must be a number' })
    .int('capacity must be an integer')
    .positive('capacity must be positive')
    .max(Number.MAX_SAFE_INTEGER, 'capacity must be a safe integer'),
  /** Desired false positive rate (p) */
  errorRate: z
    .number({ invalid_type_error: 'errorRate must be a number' })
    .gt(0, 'errorRate must be between 0 and 1')
    .lt(1, 'errorRate must be between 0 and 1'),
});

export type FilterOptions = z.infer<typeof FilterOptionsSchema>;

export interface EngineOptions {
  /** Receives lifecycle events and cleanup failures (default: discard) */
  logger?: Logger;
}

/**
 * Validates capacity and error rate.
 * @throws {InvalidParameterError} naming the first offending field
 */
export function parseFilterOptions(input: unknown): FilterOptions {
  const result = FilterOptionsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidParameterError(issue?.message ?? 'invalid filter options');
  }
  return result.data;
}
