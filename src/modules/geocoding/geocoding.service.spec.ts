import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { axiosHttpError, axiosResponse, axiosTimeout } from '../../testing/axios';
import { GeocodingService } from './geocoding.service';

describe('GeocodingService', () => {
  let service: GeocodingService;

  beforeEach(() => {
    service = new GeocodingService(
      new ConfigService({
        OPENWEATHER_BASE_URL: 'https://owm.test',
        OPENWEATHER_API_KEY: 'test-secret',
        GEOCODER_TIMEOUT_MS: 5000,
      }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('resolves the first match with a bounded timeout', async () => {
    const get = jest
      .spyOn(axios, 'get')
      .mockResolvedValue(
        axiosResponse([{ name: 'London', lat: 51.5073, lon: -0.1276, country: 'GB' }]),
      );

    await expect(service.resolve(' London ')).resolves.toEqual({
      latitude: 51.5073,
      longitude: -0.1276,
    });
    expect(get).toHaveBeenCalledWith('https://owm.test/geo/1.0/direct', {
      params: { q: 'London', limit: 1, appid: 'test-secret' },
      timeout: 5000,
    });
  });

  it('returns null for an empty result list', async () => {
    jest.spyOn(axios, 'get').mockResolvedValue(axiosResponse([]));
    await expect(service.resolve('Atlantis')).resolves.toBeNull();
  });

  it('returns null on timeouts and HTTP errors', async () => {
    jest
      .spyOn(axios, 'get')
      .mockRejectedValueOnce(axiosTimeout())
      .mockRejectedValueOnce(axiosHttpError(500));

    await expect(service.resolve('London')).resolves.toBeNull();
    await expect(service.resolve('London')).resolves.toBeNull();
  });

  it('skips the lookup for a blank name', async () => {
    const get = jest.spyOn(axios, 'get');
    await expect(service.resolve('   ')).resolves.toBeNull();
    expect(get).not.toHaveBeenCalled();
  });
});
