import { KeyedMutex } from '../../common/concurrency/keyed-mutex';
import { AnalysisCancelledError } from '../../common/errors/analysis-errors';
import type { SessionRecord } from '../../shared/types/schemas';
import { EvictionPolicy, noEviction } from './session-eviction';

export const SESSION_STORE = Symbol('SESSION_STORE');

export type SessionUpdate = (
  current: SessionRecord | undefined,
) => SessionRecord | Promise<SessionRecord>;

export interface SessionStore {
  /** `undefined` means NotFound, which is a valid empty result. */
  get(sessionId: string): SessionRecord | undefined;
  /** Overwrites: last write wins, nothing is merged or kept as history. */
  put(sessionId: string, record: SessionRecord): Promise<void>;
  /**
   * Read-modify-write, serialised against every other write to the same id.
   * Rejects with AnalysisCancelledError, writing nothing, if `signal` has
   * aborted by the time the lock is held.
   */
  update(
    sessionId: string,
    next: SessionUpdate,
    signal?: AbortSignal,
  ): Promise<SessionRecord>;
  delete(sessionId: string): Promise<boolean>;
  readonly size: number;
}

const throwIfAborted = (sessionId: string, signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new AnalysisCancelledError(
      `Write to session ${sessionId} cancelled`,
      { cause: signal.reason },
    );
  }
};

/**
 * Process-lifetime session memory. Writes for one id go through a per-key
 * lock; stored records are frozen copies so readers never see a half-written
 * value.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, SessionRecord>();
  private readonly locks = new KeyedMutex();

  constructor(private readonly eviction: EvictionPolicy = noEviction) {}

  get size(): number {
    return this.records.size;
  }

  get(sessionId: string): SessionRecord | undefined {
    return this.records.get(sessionId);
  }

  put(sessionId: string, record: SessionRecord): Promise<void> {
    return this.locks.runExclusive(sessionId, () => {
      this.write(sessionId, record);
    });
  }

  update(
    sessionId: string,
    next: SessionUpdate,
    signal?: AbortSignal,
  ): Promise<SessionRecord> {
    return this.locks.runExclusive(sessionId, async () => {
      throwIfAborted(sessionId, signal);
      const record = await next(this.records.get(sessionId));
      throwIfAborted(sessionId, signal);
      return this.write(sessionId, record);
    });
  }

  delete(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, () =>
      this.records.delete(sessionId),
    );
  }

  private write(sessionId: string, record: SessionRecord): SessionRecord {
    const stored = Object.freeze({ ...record, session_id: sessionId });
    // Re-insert so Map iteration order tracks recency.
    this.records.delete(sessionId);
    this.records.set(sessionId, stored);

    for (const evicted of this.eviction.selectEvictions(this.records)) {
      if (evicted !== sessionId) this.records.delete(evicted);
    }
    return stored;
  }
}
