import { AnalysisCancelledError } from '../../common/errors/analysis-errors';
import type { SessionRecord } from '../../shared/types/schemas';
import { LruEvictionPolicy } from './session-eviction';
import { InMemorySessionStore } from './session.store';

const record = (overrides: Partial<SessionRecord> = {}): SessionRecord => ({
  session_id: 'sess-1',
  last_disaster_type: 'fire',
  last_risk_level: 'high',
  last_lives_in_danger: false,
  analysis_count: 1,
  last_updated_timestamp: '2024-05-01T10:00:00.000Z',
  ...overrides,
});

describe('InMemorySessionStore', () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  it('returns undefined for an unknown session', () => {
    expect(store.get('missing')).toBeUndefined();
  });

  it('overwrites the previous record instead of merging', async () => {
    await store.put('sess-1', record());
    await store.put(
      'sess-1',
      record({ last_disaster_type: 'flood', last_risk_level: 'low' }),
    );

    expect(store.get('sess-1')).toEqual(
      record({ last_disaster_type: 'flood', last_risk_level: 'low' }),
    );
    expect(store.size).toBe(1);
  });

  it('keys the stored record by the id it was written under', async () => {
    await store.put('sess-2', record({ session_id: 'something-else' }));

    expect(store.get('sess-2')?.session_id).toBe('sess-2');
  });

  it('stores frozen copies', async () => {
    const input = record();
    await store.put('sess-1', input);
    input.analysis_count = 99;

    const stored = store.get('sess-1');
    expect(stored?.analysis_count).toBe(1);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('applies concurrent puts in call order', async () => {
    await Promise.all([
      store.put('sess-1', record({ last_disaster_type: 'fire' })),
      store.put('sess-1', record({ last_disaster_type: 'storm' })),
    ]);

    expect(store.get('sess-1')?.last_disaster_type).toBe('storm');
  });

  it('serialises read-modify-write updates on the same id', async () => {
    const increment = () =>
      store.update('sess-1', async (current) => {
        await new Promise((resolve) => setImmediate(resolve));
        return record({ analysis_count: (current?.analysis_count ?? 0) + 1 });
      });

    await Promise.all([increment(), increment(), increment()]);

    expect(store.get('sess-1')?.analysis_count).toBe(3);
  });

  it('leaves the record untouched when an update fails', async () => {
    await store.put('sess-1', record());

    await expect(
      store.update('sess-1', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(store.get('sess-1')).toEqual(record());
  });

  it('drops an update whose signal aborts while it waits for the lock', async () => {
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const first = store.update('sess-1', async () => {
      await held;
      return record();
    });
    const controller = new AbortController();
    const second = store.update(
      'sess-1',
      () => record({ analysis_count: 2 }),
      controller.signal,
    );

    controller.abort();
    release();

    await first;
    await expect(second).rejects.toBeInstanceOf(AnalysisCancelledError);
    expect(store.get('sess-1')?.analysis_count).toBe(1);
  });

  it('deletes a session', async () => {
    await store.put('sess-1', record());

    await expect(store.delete('sess-1')).resolves.toBe(true);
    await expect(store.delete('sess-1')).resolves.toBe(false);
    expect(store.get('sess-1')).toBeUndefined();
  });

  describe('with LRU eviction', () => {
    it('drops the least recently updated session past the limit', async () => {
      store = new InMemorySessionStore(new LruEvictionPolicy(2));

      const at = (minute: string) =>
        record({ last_updated_timestamp: `2024-05-01T10:${minute}:00.000Z` });

      await store.put('a', at('00'));
      await store.put('b', at('01'));
      await store.put('a', at('02'));
      await store.put('c', at('03'));

      expect(store.size).toBe(2);
      expect(store.get('b')).toBeUndefined();
      expect(store.get('a')).toBeDefined();
      expect(store.get('c')).toBeDefined();
    });
  });
});

describe('LruEvictionPolicy', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new LruEvictionPolicy(0)).toThrow(RangeError);
  });
});
