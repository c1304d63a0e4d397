import { z } from 'zod';
import { RestoreError } from './errors.js';
import type { ShardDescriptor } from './partition.js';

/** Field names of the metadata record kept under the filter's own key */
export const InfoKey = {
  name: 'name',
  n: 'n',
  p: 'p',
  m: 'm',
  k: 'k',
  parts: 'parts',
} as const;

export interface FilterParameters {
  readonly name: string;
  /** Target capacity */
  readonly n: number;
  /** Target false positive rate */
  readonly p: number;
  /** Bit-array length */
  readonly m: number;
  /** Hash function count */
  readonly k: number;
}

export interface FilterMetadata extends FilterParameters {
  readonly shards: readonly ShardDescriptor[];
}

const MAX_UINT32 = 0xffffffff;

/**
 * Ceiling on a stored hash count. The calculator never exceeds ~1075 (p at
 * the smallest positive double), so anything above is a corrupt record.
 */
export const MAX_HASH_COUNT = 2048;

const UnsignedText = z
  .string()
  .regex(/^\d+$/, 'expected an unsigned decimal integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'integer exceeds the safe range');

const PositiveText = UnsignedText.refine((value) => value >= 1, 'must be at least 1');

const RateText = z
  .string()
  .regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/, 'expected a decimal number')
  .transform(Number)
  .refine((value) => value > 0 && value < 1, 'must be between 0 and 1');

const PartSchema = z.object({
  Name: z.string().min(1),
  Max: z.number().int().min(0).max(MAX_UINT32),
});

const PartsText = z.string().transform((text, ctx) => {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not valid JSON' });
    return z.NEVER;
  }
}).pipe(z.array(PartSchema).min(1, 'no shards listed'));

const RecordSchema = z.object({
  [InfoKey.name]: z.string(),
  [InfoKey.n]: PositiveText,
  [InfoKey.p]: RateText,
  [InfoKey.m]: PositiveText,
  [InfoKey.k]: PositiveText.refine(
    (value) => value <= MAX_HASH_COUNT,
    `must be at most ${MAX_HASH_COUNT}`
  ),
  [InfoKey.parts]: PartsText,
});

/** Serializes filter metadata to the string fields stored in the record. */
export function encodeMetadata(metadata: FilterMetadata): Record<string, string> {
  const parts = metadata.shards.map((shard) => ({ Name: shard.key, Max: shard.maxOffset }));

  return {
    [InfoKey.name]: metadata.name,
    [InfoKey.n]: String(metadata.n),
    [InfoKey.p]: String(metadata.p),
    [InfoKey.m]: String(metadata.m),
    [InfoKey.k]: String(metadata.k),
    [InfoKey.parts]: JSON.stringify(parts),
  };
}

/**
 * Parses a stored record. `m` and `k` are taken as stored, never recomputed
 * from `n` and `p`.
 * @param filterName - Key the record was read from, used in error messages
 * @throws {RestoreError} Naming the first field that fails to parse
 */
export function decodeMetadata(
  filterName: string,
  fields: Record<string, string>
): FilterMetadata {
  const result = RecordSchema.safeParse(fields);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    throw new RestoreError(
      filterName,
      typeof field === 'string' ? field : 'record',
      issue?.message ?? 'unparsable record'
    );
  }

  const { name, n, p, m, k, parts } = result.data;
  if (name !== filterName) {
    throw new RestoreError(filterName, InfoKey.name, `record belongs to "${name}"`);
  }
  const shards = parts.map((part) => Object.freeze({ key: part.Name, maxOffset: part.Max }));

  return Object.freeze({ name, n, p, m, k, shards: Object.freeze(shards) });
}
