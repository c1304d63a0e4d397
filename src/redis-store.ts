import { Redis, type RedisOptions } from 'ioredis';
import type { BitmapPipeline, BitmapStore } from './store.js';

/**
 * Redis bitmaps address offsets below 2^32 (SETBIT, GETBIT).
 * https://redis.io/commands/setbit
 */
export const REDIS_MAX_BIT_OFFSET = 2 ** 32 - 1;

/** The ioredis pipeline commands the store issues */
export interface RedisPipelineCommands {
  setbit(key: string, offset: number, value: number): RedisPipelineCommands;
  getbit(key: string, offset: number): RedisPipelineCommands;
  exec(): Promise<[error: Error | null, result: unknown][] | null>;
}

/** The ioredis client commands the store issues. An ioredis `Redis` satisfies it. */
export interface RedisCommands {
  setbit(key: string, offset: number, value: number): Promise<number>;
  exists(key: string): Promise<number>;
  del(...keys: string[]): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, fields: Record<string, string>): Promise<number>;
  pipeline(): RedisPipelineCommands;
}

function toBit(value: unknown): 0 | 1 {
  if (value === 0 || value === 1) {
    return value;
  }
  throw new Error(`expected a bit reply, got ${JSON.stringify(value)}`);
}

class RedisBitmapPipeline implements BitmapPipeline {
  constructor(private readonly pipe: RedisPipelineCommands) {}

  setBit(key: string, offset: number, value: 0 | 1): BitmapPipeline {
    this.pipe.setbit(key, offset, value);
    return this;
  }

  getBit(key: string, offset: number): BitmapPipeline {
    this.pipe.getbit(key, offset);
    return this;
  }

  async exec(): Promise<number[]> {
    const replies = await this.pipe.exec();
    if (replies === null) {
      throw new Error('pipeline was discarded before execution');
    }

    return replies.map(([error, result]) => {
      if (error) {
        throw error;
      }
      return toBit(result);
    });
  }
}

/**
 * {@link BitmapStore} over an ioredis client. Metadata records are Redis
 * hashes; shards are plain string keys used as bitmaps.
 *
 * Timeouts, retries and reconnection are whatever the client was configured
 * with.
 */
export class RedisBitmapStore implements BitmapStore {
  readonly maxBitOffset = REDIS_MAX_BIT_OFFSET;

  constructor(private readonly redis: RedisCommands) {}

  /**
   * Opens a new ioredis connection.
   * @param url - Connection string, e.g. `redis://localhost:6379/0`
   */
  static connect(url: string, options: RedisOptions = {}): { store: RedisBitmapStore; client: Redis } {
    const client = new Redis(url, options);
    return { store: new RedisBitmapStore(client), client };
  }

  async setBit(key: string, offset: number, value: 0 | 1): Promise<0 | 1> {
    return toBit(await this.redis.setbit(key, offset, value));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.redis.del(...keys);
  }

  async readRecord(key: string): Promise<Record<string, string>> {
    return this.redis.hgetall(key);
  }

  async writeRecord(key: string, fields: Record<string, string>): Promise<void> {
    await this.redis.hset(key, fields);
  }

  pipeline(): BitmapPipeline {
    return new RedisBitmapPipeline(this.redis.pipeline());
  }
}
