import { describe, it, expect } from 'vitest';
import { hashPositions, rejectionSample, seededHash64 } from '../src/index.js';

const MAX_UINT64 = (1n << 64n) - 1n;

describe('rejectionSample', () => {
  it('should reduce accepted draws modulo m', () => {
    expect(rejectionSample(17n, 10n)).toBe(7n);
    expect(rejectionSample(10n, 10n)).toBe(0n);
  });

  it('should reject zero', () => {
    expect(rejectionSample(0n, 10n)).toBeUndefined();
  });

  it('should reject draws above the last whole multiple of m', () => {
    // MAX_UINT64 % 10 === 5
    const limit = MAX_UINT64 - 5n;

    expect(rejectionSample(limit, 10n)).toBe(0n);
    expect(rejectionSample(limit + 1n, 10n)).toBeUndefined();
    expect(rejectionSample(MAX_UINT64, 10n)).toBeUndefined();
  });

  it('should accept every non-zero draw when m is 1', () => {
    expect(rejectionSample(MAX_UINT64, 1n)).toBe(0n);
  });
});

describe('seededHash64', () => {
  it('should be deterministic for the same seed and input', () => {
    expect(seededHash64(42n, 'hello')).toBe(seededHash64(42n, 'hello'));
  });

  it('should stay within 64 bits', () => {
    const hash = seededHash64(7n, new Uint8Array([1, 2, 3]));

    expect(hash >= 0n).toBe(true);
    expect(hash <= MAX_UINT64).toBe(true);
  });

  it('should depend on the seed', () => {
    expect(seededHash64(0n, 'hello')).not.toBe(seededHash64(1n, 'hello'));
  });
});

describe('hashPositions', () => {
  it('should return exactly k positions within [0, m)', () => {
    for (const value of ['aaaaaa', 'b', 'abcdefg', 'こんにちは']) {
      const positions = hashPositions(value, 10, 1437759);

      expect(positions).toHaveLength(10);
      for (const position of positions) {
        expect(Number.isInteger(position)).toBe(true);
        expect(position).toBeGreaterThanOrEqual(0);
        expect(position).toBeLessThan(1437759);
      }
    }
  });

  it('should be deterministic across calls', () => {
    const data = new Uint8Array([255, 0, 128]);

    expect(hashPositions(data, 7, 9586)).toEqual(hashPositions(data, 7, 9586));
  });

  it('should treat a string and its UTF-8 bytes alike', () => {
    const bytes = new TextEncoder().encode('hello');

    expect(hashPositions(bytes, 5, 1000)).toEqual(hashPositions('hello', 5, 1000));
  });

  it('should give different values different positions', () => {
    expect(hashPositions('hello', 8, 1_000_000)).not.toEqual(hashPositions('world', 8, 1_000_000));
  });

  it('should derive positions for an empty value', () => {
    const positions = hashPositions(new Uint8Array(0), 3, 1000);

    expect(positions).toHaveLength(3);
    expect(positions.every((position) => position >= 0 && position < 1000)).toBe(true);
    expect(hashPositions('', 3, 1000)).toEqual(positions);
  });

  it('should handle a one-bit filter', () => {
    expect(hashPositions('anything', 3, 1)).toEqual([0, 0, 0]);
  });

  it('should address positions beyond 2^32', () => {
    const size = 2 ** 40;
    const positions = hashPositions('wide', 64, size);

    expect(positions.every((position) => position < size)).toBe(true);
    expect(positions.some((position) => position >= 2 ** 32)).toBe(true);
  });
});
