import { InternalError } from './errors.js';

export interface ShardDescriptor {
  /** Store key, `<filterName>:<index>` */
  readonly key: string;
  /** Highest bit offset written in this shard */
  readonly maxOffset: number;
}

export interface Location {
  /** Store key of the shard holding the bit */
  readonly key: string;
  /** Bit offset inside that shard */
  readonly offset: number;
}

/**
 * Splits an `m`-bit array into shards of at most `shardCapacity` bits.
 *
 * Every shard but the last spans the full capacity. The last one ends at
 * `m mod shardCapacity`, so a filter whose size is an exact multiple of the
 * capacity still gets a trailing one-bit shard.
 */
export function planPartitions(
  name: string,
  size: number,
  shardCapacity: number
): readonly ShardDescriptor[] {
  const count = Math.floor(size / shardCapacity) + 1;
  const shards: ShardDescriptor[] = [];

  for (let i = 0; i < count; i++) {
    const maxOffset = i === count - 1 ? size % shardCapacity : shardCapacity - 1;
    shards.push(Object.freeze({ key: `${name}:${i}`, maxOffset }));
  }

  return Object.freeze(shards);
}

/**
 * Maps filter-wide bit positions to `(shard, offset)` pairs.
 * @throws {InternalError} If a position falls outside the planned shards
 */
export function resolveLocations(
  positions: readonly number[],
  shards: readonly ShardDescriptor[],
  shardCapacity: number
): Location[] {
  return positions.map((position) => {
    const index = Math.floor(position / shardCapacity);
    const offset = position % shardCapacity;
    const shard = shards[index];

    if (shard === undefined || offset > shard.maxOffset) {
      throw new InternalError(
        `bit position ${position} is outside the ${shards.length} planned shard(s)`,
        'OUT_OF_RANGE'
      );
    }
    return { key: shard.key, offset };
  });
}
