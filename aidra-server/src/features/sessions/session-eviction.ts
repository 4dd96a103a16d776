import type { SessionRecord } from '../../shared/types/schemas';

/**
 * Decides which sessions to drop after a write. The store calls it with the
 * full map and deletes whatever ids it returns.
 */
export interface EvictionPolicy {
  selectEvictions(records: ReadonlyMap<string, SessionRecord>): string[];
}

export const noEviction: EvictionPolicy = {
  selectEvictions: () => [],
};

/** Keeps the `maxEntries` most recently updated sessions. */
export class LruEvictionPolicy implements EvictionPolicy {
  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(
        `maxEntries must be a positive integer, got ${maxEntries}`,
      );
    }
  }

  selectEvictions(records: ReadonlyMap<string, SessionRecord>): string[] {
    const overflow = records.size - this.maxEntries;
    if (overflow <= 0) return [];

    return [...records.values()]
      .sort(
        (a, b) =>
          Date.parse(a.last_updated_timestamp) -
          Date.parse(b.last_updated_timestamp),
      )
      .slice(0, overflow)
      .map((record) => record.session_id);
  }
}
