import type { BitmapPipeline, BitmapStore } from '../src/store.js';

type Command =
  | { kind: 'setBit'; key: string; offset: number; value: 0 | 1 }
  | { kind: 'getBit'; key: string; offset: number };

export type FailPoint = 'setBit' | 'exists' | 'del' | 'readRecord' | 'writeRecord' | 'exec';

/**
 * In-process stand-in for a bitmap store. Bitmaps are sets of set offsets;
 * records are plain objects. `failOn` makes the next calls of one kind reject.
 */
export class MemoryBitmapStore implements BitmapStore {
  readonly bitmaps = new Map<string, { length: number; bits: Set<number> }>();
  readonly records = new Map<string, Record<string, string>>();
  /** Number of pipelines executed, i.e. round trips for batched commands */
  roundTrips = 0;
  /** Commands carried by the last executed pipeline */
  lastBatch: Command[] = [];

  private failures = new Map<FailPoint, { after: number; error: Error }>();

  constructor(readonly maxBitOffset: number = 2 ** 32 - 1) {}

  /** Rejects calls of `point` once `after` of them have succeeded */
  failOn(point: FailPoint, error: Error, after = 0): void {
    this.failures.set(point, { after, error });
  }

  keys(): string[] {
    return [...this.bitmaps.keys(), ...this.records.keys()].sort();
  }

  isSet(key: string, offset: number): boolean {
    return this.bitmaps.get(key)?.bits.has(offset) ?? false;
  }

  async setBit(key: string, offset: number, value: 0 | 1): Promise<0 | 1> {
    this.trip('setBit');
    return this.applySetBit(key, offset, value);
  }

  async exists(key: string): Promise<boolean> {
    this.trip('exists');
    return this.bitmaps.has(key) || this.records.has(key);
  }

  async del(...keys: string[]): Promise<number> {
    this.trip('del');
    let removed = 0;
    for (const key of keys) {
      if (this.bitmaps.delete(key) || this.records.delete(key)) {
        removed++;
      }
    }
    return removed;
  }

  async readRecord(key: string): Promise<Record<string, string>> {
    this.trip('readRecord');
    return { ...this.records.get(key) };
  }

  async writeRecord(key: string, fields: Record<string, string>): Promise<void> {
    this.trip('writeRecord');
    this.records.set(key, { ...this.records.get(key), ...fields });
  }

  pipeline(): BitmapPipeline {
    const commands: Command[] = [];
    const pipeline: BitmapPipeline = {
      setBit: (key, offset, value) => {
        commands.push({ kind: 'setBit', key, offset, value });
        return pipeline;
      },
      getBit: (key, offset) => {
        commands.push({ kind: 'getBit', key, offset });
        return pipeline;
      },
      exec: async () => {
        this.trip('exec');
        this.roundTrips++;
        this.lastBatch = [...commands];
        return commands.map((command) =>
          command.kind === 'setBit'
            ? this.applySetBit(command.key, command.offset, command.value)
            : this.isSet(command.key, command.offset) ? 1 : 0
        );
      },
    };
    return pipeline;
  }

  private applySetBit(key: string, offset: number, value: 0 | 1): 0 | 1 {
    if (offset < 0 || offset > this.maxBitOffset) {
      throw new Error('ERR bit offset is not an integer or out of range');
    }
    const bitmap = this.bitmaps.get(key) ?? { length: 0, bits: new Set<number>() };
    this.bitmaps.set(key, bitmap);
    bitmap.length = Math.max(bitmap.length, offset + 1);

    const previous = bitmap.bits.has(offset) ? 1 : 0;
    if (value === 1) {
      bitmap.bits.add(offset);
    } else {
      bitmap.bits.delete(offset);
    }
    return previous;
  }

  private trip(point: FailPoint): void {
    const failure = this.failures.get(point);
    if (failure === undefined) return;
    if (failure.after > 0) {
      failure.after--;
      return;
    }
    throw failure.error;
  }
}
