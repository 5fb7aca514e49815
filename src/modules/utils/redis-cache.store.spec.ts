import { KEY_PREFIX, RedisCacheStore } from './redis-cache.store';

describe('RedisCacheStore', () => {
  const redis = {
    get: jest.fn(),
    setex: jest.fn(),
    del: jest.fn(),
    keys: jest.fn(),
    ping: jest.fn(),
    quit: jest.fn(),
    on: jest.fn(),
  };
  let store: RedisCacheStore;

  beforeEach(() => {
    jest.resetAllMocks();
    store = new RedisCacheStore(redis);
  });

  it('listens for connection events', () => {
    expect(redis.on).toHaveBeenCalledWith('connect', expect.any(Function));
    expect(redis.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('writes values with a TTL in seconds', async () => {
    redis.setex.mockResolvedValue('OK');

    await store.set('weather:abc', '{"temp":21}', 60);

    expect(redis.setex).toHaveBeenCalledWith('weather:abc', 60, '{"temp":21}');
  });

  it('reads values through unchanged', async () => {
    redis.get.mockResolvedValueOnce('{"temp":21}').mockResolvedValueOnce(null);

    await expect(store.get('weather:abc')).resolves.toBe('{"temp":21}');
    await expect(store.get('weather:missing')).resolves.toBeNull();
  });

  it('reports whether a delete removed anything', async () => {
    redis.del.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    await expect(store.delete('weather:abc')).resolves.toBe(true);
    await expect(store.delete('weather:abc')).resolves.toBe(false);
  });

  it('strips the key prefix before deleting on clear', async () => {
    redis.keys.mockResolvedValue([
      'weather-iot:cache:weather:abc',
      'weather-iot:cache:geocode:def',
    ]);
    redis.del.mockResolvedValue(2);

    await store.clear();

    expect(redis.keys).toHaveBeenCalledWith(`${KEY_PREFIX}*`);
    expect(redis.del).toHaveBeenCalledWith('weather:abc', 'geocode:def');
  });

  it('skips the delete when nothing is cached', async () => {
    redis.keys.mockResolvedValue([]);

    await store.clear();

    expect(redis.del).not.toHaveBeenCalled();
  });

  it('counts prefixed keys', async () => {
    redis.keys.mockResolvedValue([
      'weather-iot:cache:weather:abc',
      'weather-iot:cache:geocode:def',
    ]);

    await expect(store.size()).resolves.toBe(2);
    expect(redis.keys).toHaveBeenCalledWith('weather-iot:cache:*');
  });

  it('is healthy only on PONG', async () => {
    redis.ping.mockResolvedValueOnce('PONG').mockResolvedValueOnce('LOADING');

    await expect(store.ping()).resolves.toBe(true);
    await expect(store.ping()).resolves.toBe(false);
  });

  it('quits the client on shutdown', async () => {
    redis.quit.mockResolvedValue('OK');

    await store.onModuleDestroy();

    expect(redis.quit).toHaveBeenCalledTimes(1);
  });
});
