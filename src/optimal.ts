import { InvalidParameterError } from './errors.js';
import { parseFilterOptions } from './options.js';

/**
 * Calculate optimal Bloom filter parameters
 * @param capacity Expected number of items (n)
 * @param errorRate Desired false positive rate (p)
 * @returns Bit size (m) and hash count (k), both at least 1
 * @throws {InvalidParameterError} If capacity is not a positive integer or errorRate is not in (0, 1)
 */
export function calculateOptimalParams(
  capacity: number,
  errorRate: number
): { size: number; hashCount: number } {
  parseFilterOptions({ capacity, errorRate });

  // m = n * ln(p) / ln(1 / 2^ln2), i.e. -n * ln(p) / (ln(2)^2)
  const size = Math.max(
    1,
    Math.ceil((capacity * Math.log(errorRate)) / Math.log(1 / Math.pow(2, Math.LN2)))
  );
  if (!Number.isSafeInteger(size)) {
    throw new InvalidParameterError(`filter of ${size} bits exceeds the addressable range`);
  }

  // k = (m/n) * ln(2), rounded half up
  const hashCount = Math.max(1, Math.floor((Math.LN2 * size) / capacity + 0.5));

  return { size, hashCount };
}
