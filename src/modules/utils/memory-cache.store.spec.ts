import { MemoryCacheStore } from './memory-cache.store';

describe('MemoryCacheStore', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-15T12:00:00Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns stored values until the ttl elapses', async () => {
    const store = new MemoryCacheStore();
    await store.set('weather:london:1', '{"ok":true}', 60);

    jest.advanceTimersByTime(59_999);
    expect(await store.get('weather:london:1')).toBe('{"ok":true}');

    jest.advanceTimersByTime(1);
    expect(await store.get('weather:london:1')).toBeNull();
    expect(await store.size()).toBe(0);
  });

  it('evicts the oldest entry once full', async () => {
    const store = new MemoryCacheStore(2);
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.set('a', '3', 60);
    await store.set('c', '4', 60);

    expect(await store.get('b')).toBeNull();
    expect(await store.get('a')).toBe('3');
    expect(await store.get('c')).toBe('4');
    expect(await store.size()).toBe(2);
  });

  it('deletes and clears entries', async () => {
    const store = new MemoryCacheStore();
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);

    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);

    await store.clear();
    expect(await store.size()).toBe(0);
  });
});
