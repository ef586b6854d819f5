import { ok, type BookRecord } from '@shelfscan/scraper-sdk';
import type { UpsertResult, UpsertSink } from './types.js';

/**
 * In-process sink keyed by natural key. Last write wins, like the database.
 */
export class MemoryBookSink implements UpsertSink {
  private readonly records = new Map<string, BookRecord>();
  private calls = 0;

  get size(): number {
    return this.records.size;
  }

  get upsertCalls(): number {
    return this.calls;
  }

  get(key: string): BookRecord | undefined {
    return this.records.get(key);
  }

  all(): BookRecord[] {
    return [...this.records.values()];
  }

  async upsert(batch: readonly BookRecord[]): Promise<UpsertResult[]> {
    this.calls += 1;
    const written = new Set<string>();

    for (const record of batch) {
      if (written.has(record.key)) continue;
      written.add(record.key);
      this.records.set(record.key, record);
    }

    return batch.map((record) => ({ key: record.key, result: ok(undefined) }));
  }
}
