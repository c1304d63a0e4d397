import {
  AlreadyExistsError,
  NotFoundError,
  RestoreError,
  StorageError,
  type StorageOperation,
} from './errors.js';
import { hashPositions } from './hash.js';
import { noopLogger, type Logger } from './logger.js';
import {
  decodeMetadata,
  encodeMetadata,
  type FilterMetadata,
  type FilterParameters,
} from './metadata.js';
import { calculateOptimalParams } from './optimal.js';
import type { EngineOptions, FilterOptions } from './options.js';
import {
  planPartitions,
  resolveLocations,
  type Location,
  type ShardDescriptor,
} from './partition.js';
import type { BitmapStore } from './store.js';

async function attempt<T>(
  name: string,
  operation: StorageOperation,
  run: () => Promise<T>
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new StorageError(name, operation, error);
  }
}

/**
 * A Bloom filter whose bits live in a remote bitmap store, split across as
 * many keys as the store's per-key offset limit requires.
 *
 * The filter holds no mutable state: every process that restores it by name
 * sees the same parameters and the same bits.
 *
 * @example
 * ```typescript
 * const { store } = RedisBitmapStore.connect('redis://localhost:6379');
 * const filter = await ShardedBloom.create(store, 'visitors', {
 *   capacity: 100_000,
 *   errorRate: 0.001,
 * });
 * await filter.add('alice');
 * await filter.exists('alice'); // true
 *
 * // elsewhere
 * const same = await ShardedBloom.restore(store, 'visitors');
 * ```
 */
export class ShardedBloom {
  private readonly store: BitmapStore;
  private readonly metadata: FilterMetadata;
  private readonly logger: Logger;

  private constructor(store: BitmapStore, metadata: FilterMetadata, logger: Logger) {
    this.store = store;
    this.metadata = metadata;
    this.logger = logger;
  }

  /**
   * Creates a filter under `name`: allocates every shard, then saves the
   * metadata record.
   *
   * Not atomic. A crash between the two steps leaves shard keys without a
   * record; `restore` then reports NotFound. Such orphan shard keys are
   * deleted here before allocation, so a new filter never inherits their bits.
   *
   * @throws {InvalidParameterError} If capacity or errorRate is out of range (no I/O is done)
   * @throws {AlreadyExistsError} If a key already exists under `name`
   * @throws {StorageError} If the store fails; shards created so far are deleted first
   */
  static async create(
    store: BitmapStore,
    name: string,
    options: FilterOptions,
    engine: EngineOptions = {}
  ): Promise<ShardedBloom> {
    const { capacity, errorRate } = options;
    const { size, hashCount } = calculateOptimalParams(capacity, errorRate);
    const logger = (engine.logger ?? noopLogger).child({ filter: name });

    if (await attempt(name, 'create', () => store.exists(name))) {
      throw new AlreadyExistsError(name);
    }

    const metadata: FilterMetadata = Object.freeze({
      name,
      n: capacity,
      p: errorRate,
      m: size,
      k: hashCount,
      shards: planPartitions(name, size, store.maxBitOffset + 1),
    });
    const filter = new ShardedBloom(store, metadata, logger);

    await filter.allocateShards();
    await filter.save();

    logger.debug('bloom filter created', {
      size,
      hashCount,
      shards: metadata.shards.length,
    });
    return filter;
  }

  /**
   * Re-attaches to a filter created earlier, possibly by another process.
   * Size and hash count come from the stored record as-is.
   *
   * @throws {NotFoundError} If no record exists under `name`
   * @throws {RestoreError} If the record is malformed or its shards do not fit this store
   * @throws {StorageError} If the record cannot be read
   */
  static async restore(
    store: BitmapStore,
    name: string,
    engine: EngineOptions = {}
  ): Promise<ShardedBloom> {
    const fields = await attempt(name, 'load', () => store.readRecord(name));
    if (Object.keys(fields).length === 0) {
      throw new NotFoundError(name);
    }

    const metadata = decodeMetadata(name, fields);
    assertLayout(metadata, store.maxBitOffset + 1);

    const logger = (engine.logger ?? noopLogger).child({ filter: name });
    logger.debug('bloom filter restored', {
      size: metadata.m,
      hashCount: metadata.k,
      shards: metadata.shards.length,
    });
    return new ShardedBloom(store, metadata, logger);
  }

  /** Name of the metadata key; shard keys are `<name>:<index>` */
  get name(): string {
    return this.metadata.name;
  }

  /** Expected number of items (n) */
  get capacity(): number {
    return this.metadata.n;
  }

  /** Target false positive rate (p) */
  get errorRate(): number {
    return this.metadata.p;
  }

  /** Number of bits in the filter (m) */
  get size(): number {
    return this.metadata.m;
  }

  /** Number of hash functions (k) */
  get hashCount(): number {
    return this.metadata.k;
  }

  get shards(): readonly ShardDescriptor[] {
    return this.metadata.shards;
  }

  get params(): FilterParameters {
    const { name, n, p, m, k } = this.metadata;
    return { name, n, p, m, k };
  }

  /** The `k` filter-wide bit positions of an item */
  hashes(item: string | Uint8Array): number[] {
    return hashPositions(item, this.metadata.k, this.metadata.m);
  }

  /** The `k` shard keys and offsets an item maps to */
  locations(item: string | Uint8Array): Location[] {
    return resolveLocations(this.hashes(item), this.metadata.shards, this.store.maxBitOffset + 1);
  }

  /**
   * Sets the item's `k` bits in one pipelined round trip.
   * @throws {StorageError} If the batch fails; some bits may already be set
   */
  async add(item: string | Uint8Array): Promise<void> {
    const pipeline = this.store.pipeline();
    for (const { key, offset } of this.locations(item)) {
      pipeline.setBit(key, offset, 1);
    }
    await attempt(this.name, 'add', () => pipeline.exec());
  }

  /**
   * Checks if an item might be in the filter, reading its `k` bits in one
   * pipelined round trip.
   *
   * Items that were added always test positive, except while an `add` of the
   * same item is still in flight: a concurrent check can see only some of its
   * bits and report `false`.
   *
   * @returns `true` if item might be present, `false` if definitely not present
   * @throws {StorageError} If the batch fails
   */
  async exists(item: string | Uint8Array): Promise<boolean> {
    const pipeline = this.store.pipeline();
    for (const { key, offset } of this.locations(item)) {
      pipeline.getBit(key, offset);
    }
    const bits = await attempt(this.name, 'exists', () => pipeline.exec());
    return bits.every((bit) => bit === 1);
  }

  /**
   * Deletes the metadata record and every shard. Best effort: failures are
   * logged, not thrown, and nothing is rolled back.
   * @returns Whether the delete went through
   */
  async clear(): Promise<boolean> {
    try {
      await this.store.del(this.name, ...this.metadata.shards.map((shard) => shard.key));
      return true;
    } catch (error) {
      this.logger.warn('failed to clear bloom filter', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Writes a 0 at each shard's last offset so the store allocates it at full
   * length, after deleting orphan shards of an earlier unfinished create. On
   * failure, every shard key is deleted before rethrowing.
   */
  private async allocateShards(): Promise<void> {
    const keys = this.metadata.shards.map((shard) => shard.key);
    try {
      const orphans = await this.store.del(...keys);
      if (orphans > 0) {
        this.logger.info('deleted orphan shards of an unfinished bloom filter', { orphans });
      }
      for (const shard of this.metadata.shards) {
        await this.store.setBit(shard.key, shard.maxOffset, 0);
      }
    } catch (error) {
      await this.discard(keys);
      throw new StorageError(this.name, 'create', error);
    }
  }

  private async save(): Promise<void> {
    try {
      await this.store.writeRecord(this.name, encodeMetadata(this.metadata));
    } catch (error) {
      await this.discard([this.name, ...this.metadata.shards.map((shard) => shard.key)]);
      throw new StorageError(this.name, 'save', error);
    }
  }

  /** Compensating delete after a failed create. Its own failure is logged only. */
  private async discard(keys: string[]): Promise<void> {
    try {
      await this.store.del(...keys);
    } catch (error) {
      this.logger.error('failed to delete keys of a partially created bloom filter', error, {
        keys,
      });
    }
  }
}

/**
 * Checks that stored shards are exactly the layout this store's capacity
 * gives for the stored size, so every hash position resolves.
 */
function assertLayout(metadata: FilterMetadata, shardCapacity: number): void {
  const expected = planPartitions(metadata.name, metadata.m, shardCapacity);
  const { shards } = metadata;

  if (shards.length !== expected.length) {
    throw new RestoreError(
      metadata.name,
      'parts',
      `expected ${expected.length} shard(s) for ${metadata.m} bits, found ${shards.length}`
    );
  }
  expected.forEach((want, i) => {
    const got = shards[i];
    if (got === undefined || got.key !== want.key || got.maxOffset !== want.maxOffset) {
      throw new RestoreError(
        metadata.name,
        'parts',
        `shard ${i} should be ${want.key} up to offset ${want.maxOffset}`
      );
    }
  });
}

export { calculateOptimalParams } from './optimal.js';
export { hashPositions, rejectionSample, seededHash64, MAX_REJECTIONS } from './hash.js';
export { planPartitions, resolveLocations } from './partition.js';
export type { Location, ShardDescriptor } from './partition.js';
export { decodeMetadata, encodeMetadata, InfoKey, MAX_HASH_COUNT } from './metadata.js';
export type { FilterMetadata, FilterParameters } from './metadata.js';
export { FilterOptionsSchema, parseFilterOptions } from './options.js';
export type { EngineOptions, FilterOptions } from './options.js';
export { createLogger, noopLogger } from './logger.js';
export type { LogEntry, LogLevel, Logger, LoggerOptions } from './logger.js';
export type { BitmapPipeline, BitmapStore } from './store.js';
export { RedisBitmapStore, REDIS_MAX_BIT_OFFSET } from './redis-store.js';
export type { RedisCommands, RedisPipelineCommands } from './redis-store.js';
export * from './errors.js';
