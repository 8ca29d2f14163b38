import { MemoryResultCache } from '../resultCache';

describe('MemoryResultCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000;
  });

  it('returns the last outcome per serial and method', () => {
    const cache = new MemoryResultCache({ ttlMs: 10_000, maxEntries: 10, now });

    cache.record('A', 'adb-setup-state-read', 'Failed');
    cache.record('A', 'adb-setup-state-read', 'Success');

    expect(cache.get('A', 'adb-setup-state-read')).toEqual({ outcome: 'Success', recordedAt: 1_000 });
    expect(cache.get('B', 'adb-setup-state-read')).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it('expires entries once the TTL has elapsed', () => {
    const cache = new MemoryResultCache({ ttlMs: 500, maxEntries: 10, now });
    cache.record('A', 'm', 'Success');

    clock = 1_499;
    expect(cache.get('A', 'm')?.outcome).toBe('Success');

    clock = 1_500;
    expect(cache.get('A', 'm')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('evicts the least recently recorded entry past the limit', () => {
    const cache = new MemoryResultCache({ ttlMs: 10_000, maxEntries: 2, now });
    cache.record('A', 'first', 'Failed');
    cache.record('A', 'second', 'Failed');
    cache.record('A', 'first', 'Success');

    cache.record('A', 'third', 'Error');

    expect(cache.get('A', 'second')).toBeUndefined();
    expect(cache.get('A', 'first')?.outcome).toBe('Success');
    expect(cache.get('A', 'third')?.outcome).toBe('Error');
  });
});
