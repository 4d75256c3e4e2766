import { MemoryCache } from '../../src/cache/cache.class.js';
import { CacheError } from '../../src/errors.js';

describe('MemoryCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  test('stores and returns values', async () => {
    const cache = new MemoryCache({ now });
    await cache.set('snapshot', { tags: [], servers: [] });

    expect(await cache.get('snapshot')).toEqual({ tags: [], servers: [] });
    expect(await cache.get('missing')).toBeUndefined();
    expect(cache.stats).toEqual({ hits: 1, misses: 1, expired: 0, sets: 1 });
  });

  test('returns copies, not the stored object', async () => {
    const cache = new MemoryCache({ now });
    const value = { names: ['a'] };
    await cache.set('k', value);
    value.names.push('b');

    expect(await cache.get('k')).toEqual({ names: ['a'] });
  });

  test('expires entries after the ttl', async () => {
    const cache = new MemoryCache({ ttl: 1000, now });
    await cache.set('k', 'v');

    clock += 1000;
    expect(await cache.get('k')).toBe('v');

    clock += 1;
    expect(await cache.get('k')).toBeUndefined();
    expect(cache.stats.expired).toBe(1);

    clock -= 1001;
    expect(await cache.get('k')).toBeUndefined();
  });

  test('keeps entries forever with a zero ttl', async () => {
    const cache = new MemoryCache({ ttl: 0, now });
    await cache.set('k', 'v');
    clock += 365 * 24 * 3600 * 1000;
    expect(await cache.get('k')).toBe('v');
  });

  test('applies a changed ttl to entries already stored', async () => {
    const cache = new MemoryCache({ ttl: 0, now });
    await cache.set('k', 'v');

    clock += 5000;
    cache.ttl = 1000;
    expect(await cache.get('k')).toBeUndefined();
  });

  test('deletes and clears entries', async () => {
    const cache = new MemoryCache({ now });
    await cache.set('a', 1);
    await cache.set('b', 2);

    await cache.del('a');
    expect(await cache.get('a')).toBeUndefined();
    expect(await cache.get('b')).toBe(2);

    await cache.clear();
    expect(await cache.get('b')).toBeUndefined();
  });

  test('emits events', async () => {
    const cache = new MemoryCache({ now });
    const events: string[] = [];
    for (const name of ['set', 'hit', 'miss', 'deleted', 'clear']) {
      cache.on(name, () => events.push(name));
    }

    await cache.set('k', 'v');
    await cache.get('k');
    await cache.get('other');
    await cache.del('k');
    await cache.clear();

    expect(events).toEqual(['set', 'hit', 'miss', 'deleted', 'clear']);
  });

  test('rejects empty keys', async () => {
    const cache = new MemoryCache();
    await expect(cache.set('', 'v')).rejects.toThrow(CacheError);
    await expect(cache.get('')).rejects.toThrow('Invalid cache key');
  });
});
