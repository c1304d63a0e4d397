/**
 * The subset of a remote bitmap store that a sharded filter needs.
 *
 * Implementations must deliver pipelined commands in a single round trip and
 * resolve `exec()` with one result per queued command, in order, or reject
 * once for the whole batch.
 */
export interface BitmapStore {
  /** Highest bit offset a single key can address (Redis: 2^32 - 1) */
  readonly maxBitOffset: number;

  /** Sets one bit and resolves with its previous value */
  setBit(key: string, offset: number, value: 0 | 1): Promise<0 | 1>;

  exists(key: string): Promise<boolean>;

  /** Deletes keys and resolves with how many existed */
  del(...keys: string[]): Promise<number>;

  /** Reads a string-valued record; an absent key reads as `{}` */
  readRecord(key: string): Promise<Record<string, string>>;

  writeRecord(key: string, fields: Record<string, string>): Promise<void>;

  pipeline(): BitmapPipeline;
}

export interface BitmapPipeline {
  setBit(key: string, offset: number, value: 0 | 1): BitmapPipeline;
  getBit(key: string, offset: number): BitmapPipeline;
  /** Sends every queued command; results are bits for both command kinds */
  exec(): Promise<number[]>;
}
