import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WeatherProvider } from '../../config/environment';
import { GeocodingService } from '../geocoding/geocoding.service';
import { Coordinates } from '../geocoding/geocoding.types';
import { CacheService } from '../utils/cache.service';
import { Outcome, failure, success } from '../utils/outcome';
import { toUpstreamError } from '../utils/upstream-error';
import { OpenWeatherClient, describeConditions } from './openweather.client';
import { WeatherSimulator } from './weather-simulator';
import { ForecastPoint, HistoricalReading, WeatherReading } from './weather.dto';

@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);

  constructor(
    private readonly geocodingService: GeocodingService,
    private readonly client: OpenWeatherClient,
    private readonly simulator: WeatherSimulator,
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {}

  get provider(): WeatherProvider {
    return this.configService.get<WeatherProvider>(
      'WEATHER_PROVIDER',
      'openweathermap',
    );
  }

  private get ttlSeconds(): number {
    return this.configService.get<number>('WEATHER_CACHE_TTL_SECONDS', 300);
  }

  /**
   * Current conditions plus a `days`-long forecast for `city`, served from
   * cache while fresh. Geocoding is attempted once; a miss ends the lookup.
   */
  async getWeather(city: string, days = 1): Promise<Outcome<WeatherReading>> {
    const name = city.trim();
    if (!name) {
      return failure('not_found', 'City name is required');
    }

    const cacheKey = `weather:${name.toLowerCase()}:${days}`;
    const cached = await this.cacheService.get<WeatherReading>(cacheKey);
    if (cached) {
      this.logger.debug(`Using cached weather data for ${name}`);
      return success(cached);
    }

    const outcome =
      this.provider === 'simulated'
        ? success(this.simulator.generate(name, days))
        : await this.fetchLive(name, days);

    if (outcome.ok) {
      await this.cacheService.set(cacheKey, outcome.value, this.ttlSeconds);
    }

    return outcome;
  }

  /**
   * Observation for `city` at Unix time `dt`.
   */
  async getHistorical(
    city: string,
    dt: number,
  ): Promise<Outcome<HistoricalReading>> {
    const name = city.trim();
    if (!name) {
      return failure('not_found', 'City name is required');
    }

    const cacheKey = `weather:${name.toLowerCase()}:at:${dt}`;
    const cached = await this.cacheService.get<HistoricalReading>(cacheKey);
    if (cached) {
      return success(cached);
    }

    const outcome =
      this.provider === 'simulated'
        ? success(this.simulator.generateHistorical(name, dt))
        : await this.fetchLiveHistorical(name, dt);

    if (outcome.ok) {
      await this.cacheService.set(cacheKey, outcome.value, this.ttlSeconds);
    }

    return outcome;
  }

  private async fetchLive(
    city: string,
    days: number,
  ): Promise<Outcome<WeatherReading>> {
    const coordinates = await this.geocodingService.resolve(city);
    if (!coordinates) {
      return failure('not_found', `Location not found: ${city}`);
    }

    try {
      const [current, forecast] = await Promise.all([
        this.client.fetchCurrent(coordinates),
        this.fetchForecastOrEmpty(coordinates, days),
      ]);

      return success<WeatherReading>({
        source: 'live',
        city,
        country: current.country,
        coordinates,
        current: current.conditions,
        forecast,
        capturedAt: new Date().toISOString(),
      });
    } catch (error) {
      const upstreamError = toUpstreamError('weather', error);
      this.logger.error(
        `Weather fetch failed for ${city}: ${upstreamError.message}`,
      );
      return failure('unavailable', upstreamError.message);
    }
  }

  // The forecast is supplementary: losing it must not lose current conditions
  private async fetchForecastOrEmpty(
    coordinates: Coordinates,
    days: number,
  ): Promise<ForecastPoint[]> {
    try {
      return await this.client.fetchForecast(coordinates, days);
    } catch (error) {
      this.logger.warn(
        `Forecast unavailable, continuing with current conditions only: ${toUpstreamError('weather', error).message}`,
      );
      return [];
    }
  }

  private async fetchLiveHistorical(
    city: string,
    dt: number,
  ): Promise<Outcome<HistoricalReading>> {
    const coordinates = await this.geocodingService.resolve(city);
    if (!coordinates) {
      return failure('not_found', `Location not found: ${city}`);
    }

    try {
      const point = await this.client.fetchHistorical(coordinates, dt);
      if (!point) {
        return failure('not_found', `No historical data for ${city} at ${dt}`);
      }

      return success<HistoricalReading>({
        source: 'live',
        city,
        coordinates,
        requestedAt: dt,
        observedAt: point.dt,
        temperature: point.temp,
        humidity: point.humidity,
        pressure: point.pressure,
        windSpeed: point.wind_speed,
        description: describeConditions(point.weather),
        capturedAt: new Date().toISOString(),
      });
    } catch (error) {
      const upstreamError = toUpstreamError('weather', error);
      this.logger.error(
        `Historical weather fetch failed for ${city}: ${upstreamError.message}`,
      );
      return failure('unavailable', upstreamError.message);
    }
  }
}
