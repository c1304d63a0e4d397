import { hash128x64 } from 'murmur-hash';
import { InternalError } from './errors.js';

const MAX_UINT64 = (1n << 64n) - 1n;
const MASK_32 = 0xffffffffn;
const encoder = new TextEncoder();

/**
 * Rejected draws tolerated per call on top of the `k` accepted ones. For any
 * safe-integer `m` a draw is rejected with probability below 2^-11, so
 * reaching this means the hash primitive is broken.
 */
export const MAX_REJECTIONS = 1024;

/**
 * 64-bit MurmurHash3 of `value` under a 64-bit running seed: the upper half of
 * the x64/128 digest, seeded with the low 32 bits of `seed`.
 */
export function seededHash64(seed: bigint, value: string | Uint8Array): bigint {
  const hash = hash128x64(value, { seed: Number(seed & MASK_32), output: 'bigint' }) as bigint;
  return hash >> 64n;
}

/**
 * Reduces a raw hash to `[0, m)`, or returns `undefined` for draws that would
 * bias the modulo: zero, and anything above the last whole multiple of `m`.
 */
export function rejectionSample(random: bigint, m: bigint): bigint | undefined {
  if (random === 0n || random > MAX_UINT64 - (MAX_UINT64 % m)) {
    return undefined;
  }
  return random % m;
}

/**
 * Derives `k` bit positions in `[0, m)` for a value.
 *
 * Each draw re-hashes the value with the previous draw as seed, starting at 0,
 * so the sequence is identical in every process. Strings are hashed as UTF-8.
 * A zero draw is a fixed point of the chain (an empty value hashes to 0 under
 * seed 0), so after one the next seed is the attempt count instead.
 *
 * @throws {InternalError} If more than {@link MAX_REJECTIONS} draws are rejected
 */
export function hashPositions(value: string | Uint8Array, k: number, m: number): number[] {
  const bytes = typeof value === 'string' ? encoder.encode(value) : value;
  const modulus = BigInt(m);
  const positions: number[] = [];
  let seed = 0n;

  for (let attempt = 0; attempt < k + MAX_REJECTIONS; attempt++) {
    const draw = seededHash64(seed, bytes);
    seed = draw === 0n ? BigInt(attempt + 1) : draw;
    const position = rejectionSample(draw, modulus);
    if (position !== undefined) {
      positions.push(Number(position));
      if (positions.length === k) {
        return positions;
      }
    }
  }

  throw new InternalError(
    `gave up after ${k + MAX_REJECTIONS} hash draws with ${positions.length} of ${k} positions`,
    'HASH_EXHAUSTED'
  );
}
