import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { GeocodingService } from '../geocoding/geocoding.service';
import { CACHE_STORE } from '../utils/cache.interface';
import { CacheService } from '../utils/cache.service';
import { MemoryCacheStore } from '../utils/memory-cache.store';
import { RANDOM_SOURCE } from '../utils/random';
import { UpstreamTimeoutError } from '../utils/upstream-error';
import { OpenWeatherClient } from './openweather.client';
import { WeatherSimulator } from './weather-simulator';
import { WeatherService } from './weather.service';

const COORDINATES = { latitude: 48.8566, longitude: 2.3522 };

const CURRENT = {
  conditions: {
    temperature: 18.2,
    feelsLike: 17.6,
    humidity: 55,
    pressure: 1012,
    windSpeed: 3.1,
    description: 'few clouds',
  },
  country: 'FR',
};

async function createService(provider: 'openweathermap' | 'simulated') {
  const geocodingService = { resolve: jest.fn().mockResolvedValue(COORDINATES) };
  const client = {
    fetchCurrent: jest.fn().mockResolvedValue(CURRENT),
    fetchForecast: jest.fn().mockResolvedValue([]),
    fetchHistorical: jest.fn().mockResolvedValue(null),
  };

  const moduleRef = await Test.createTestingModule({
    providers: [
      WeatherService,
      WeatherSimulator,
      CacheService,
      { provide: CACHE_STORE, useValue: new MemoryCacheStore() },
      { provide: RANDOM_SOURCE, useValue: () => 0.5 },
      { provide: GeocodingService, useValue: geocodingService },
      { provide: OpenWeatherClient, useValue: client },
      {
        provide: ConfigService,
        useValue: new ConfigService({
          WEATHER_PROVIDER: provider,
          WEATHER_CACHE_TTL_SECONDS: 300,
        }),
      },
    ],
  }).compile();

  return {
    service: moduleRef.get(WeatherService),
    geocodingService,
    client,
  };
}

describe('WeatherService', () => {
  let now: jest.SpyInstance<number, []>;

  beforeEach(() => {
    now = jest.spyOn(Date, 'now').mockReturnValue(1_768_478_400_000);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('fetches once within the ttl', async () => {
    const { service, geocodingService, client } = await createService(
      'openweathermap',
    );

    const first = await service.getWeather('Paris');
    now.mockReturnValue(1_768_478_400_000 + 299_000);
    const second = await service.getWeather('paris');

    expect(first).toEqual(second);
    expect(first.ok && first.value.source).toBe('live');
    expect(first.ok && first.value.current).toEqual(CURRENT.conditions);
    expect(geocodingService.resolve).toHaveBeenCalledTimes(1);
    expect(client.fetchCurrent).toHaveBeenCalledTimes(1);
  });

  it('fetches exactly once more after the ttl expires', async () => {
    const { service, client } = await createService('openweathermap');

    await service.getWeather('Paris');
    now.mockReturnValue(1_768_478_400_000 + 300_000);
    await service.getWeather('Paris');
    await service.getWeather('Paris');

    expect(client.fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('keys the cache on forecast length', async () => {
    const { service, client } = await createService('openweathermap');

    await service.getWeather('Paris', 1);
    await service.getWeather('Paris', 3);

    expect(client.fetchForecast).toHaveBeenNthCalledWith(2, COORDINATES, 3);
    expect(client.fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('stops at a geocoding miss', async () => {
    const { service, geocodingService, client } = await createService(
      'openweathermap',
    );
    geocodingService.resolve.mockResolvedValue(null);

    await expect(service.getWeather('Atlantis')).resolves.toEqual({
      ok: false,
      reason: 'not_found',
      message: 'Location not found: Atlantis',
    });
    expect(client.fetchCurrent).not.toHaveBeenCalled();
  });

  it('reports an outage without caching it', async () => {
    const { service, client } = await createService('openweathermap');
    client.fetchCurrent
      .mockRejectedValueOnce(
        new UpstreamTimeoutError('weather', 'weather request timed out'),
      )
      .mockResolvedValueOnce(CURRENT);

    await expect(service.getWeather('Paris')).resolves.toEqual({
      ok: false,
      reason: 'unavailable',
      message: 'weather request timed out',
    });
    const retry = await service.getWeather('Paris');
    expect(retry.ok).toBe(true);
  });

  it('keeps current conditions when the forecast fails', async () => {
    const { service, client } = await createService('openweathermap');
    client.fetchForecast.mockRejectedValue(new Error('bad forecast'));

    const outcome = await service.getWeather('Paris');
    expect(outcome.ok && outcome.value.forecast).toEqual([]);
  });

  it('rejects a blank city without any lookup', async () => {
    const { service, geocodingService } = await createService('openweathermap');

    await expect(service.getWeather('  ')).resolves.toEqual({
      ok: false,
      reason: 'not_found',
      message: 'City name is required',
    });
    expect(geocodingService.resolve).not.toHaveBeenCalled();
  });

  it('tags simulated readings and never calls the provider', async () => {
    const { service, geocodingService, client } = await createService(
      'simulated',
    );

    const outcome = await service.getWeather('Pune', 2);

    expect(outcome.ok && outcome.value.source).toBe('simulated');
    expect(outcome.ok && outcome.value.forecast).toHaveLength(16);
    expect(geocodingService.resolve).not.toHaveBeenCalled();
    expect(client.fetchCurrent).not.toHaveBeenCalled();
  });

  it('maps historical observations', async () => {
    const { service, client } = await createService('openweathermap');
    client.fetchHistorical.mockResolvedValue({
      dt: 1768478400,
      temp: 4.2,
      humidity: 81,
      pressure: 1020,
      wind_speed: 2.4,
      weather: [{ id: 500, main: 'Rain', description: 'light rain', icon: '10d' }],
    });

    const outcome = await service.getHistorical('Paris', 1768478400);

    expect(outcome).toMatchObject({
      ok: true,
      value: {
        source: 'live',
        city: 'Paris',
        requestedAt: 1768478400,
        observedAt: 1768478400,
        temperature: 4.2,
        description: 'light rain',
      },
    });
  });

  it('reports missing historical data as not found', async () => {
    const { service } = await createService('openweathermap');

    await expect(service.getHistorical('Paris', 0)).resolves.toEqual({
      ok: false,
      reason: 'not_found',
      message: 'No historical data for Paris at 0',
    });
  });
});
