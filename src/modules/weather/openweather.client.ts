import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Coordinates } from '../geocoding/geocoding.types';
import { toUpstreamError } from '../utils/upstream-error';
import { CurrentConditions, ForecastPoint } from './weather.dto';
import {
  OpenWeatherCondition,
  OpenWeatherCurrentResponse,
  OpenWeatherForecastResponse,
  OpenWeatherHistoricalPoint,
  OpenWeatherTimemachineResponse,
} from './openweather.types';

// The forecast endpoint returns one entry every 3 hours
const FORECAST_ENTRIES_PER_DAY = 8;

export interface CurrentWeather {
  conditions: CurrentConditions;
  country: string | null;
}

/**
 * Live OpenWeatherMap fetcher. Every call applies WEATHER_TIMEOUT_MS and
 * throws an UpstreamError on failure; the caller decides the fallback.
 */
@Injectable()
export class OpenWeatherClient {
  private readonly logger = new Logger(OpenWeatherClient.name);

  constructor(private readonly configService: ConfigService) {}

  async fetchCurrent(coordinates: Coordinates): Promise<CurrentWeather> {
    const data = await this.request<OpenWeatherCurrentResponse>(
      '/data/2.5/weather',
      {
        lat: coordinates.latitude,
        lon: coordinates.longitude,
        units: 'metric',
      },
    );

    if (!data.main) {
      throw toUpstreamError(
        'weather',
        new Error('Current weather response has no measurements'),
      );
    }

    return {
      conditions: {
        temperature: data.main.temp,
        feelsLike: data.main.feels_like,
        humidity: data.main.humidity,
        pressure: data.main.pressure,
        windSpeed: data.wind?.speed ?? 0,
        description: describeConditions(data.weather),
      },
      country: data.sys?.country ?? null,
    };
  }

  async fetchForecast(
    coordinates: Coordinates,
    days: number,
  ): Promise<ForecastPoint[]> {
    const data = await this.request<OpenWeatherForecastResponse>(
      '/data/2.5/forecast',
      {
        lat: coordinates.latitude,
        lon: coordinates.longitude,
        units: 'metric',
        cnt: days * FORECAST_ENTRIES_PER_DAY,
      },
    );

    return (data.list ?? []).map((item) => ({
      time: new Date(item.dt * 1000).toISOString(),
      temperature: item.main.temp,
      humidity: item.main.humidity,
      description: describeConditions(item.weather),
      precipitationProbability: Math.round((item.pop ?? 0) * 100),
    }));
  }

  /**
   * One Call 3.0 "timemachine" lookup; `null` when the provider has no data
   * point for the requested instant.
   */
  async fetchHistorical(
    coordinates: Coordinates,
    dt: number,
  ): Promise<OpenWeatherHistoricalPoint | null> {
    const data = await this.request<OpenWeatherTimemachineResponse>(
      '/data/3.0/onecall/timemachine',
      {
        lat: coordinates.latitude,
        lon: coordinates.longitude,
        dt,
        units: 'metric',
      },
    );

    return data.data?.[0] ?? null;
  }

  private async request<T>(
    path: string,
    params: Record<string, string | number>,
  ): Promise<T> {
    const baseUrl = this.configService.get<string>(
      'OPENWEATHER_BASE_URL',
      'https://api.openweathermap.org',
    );

    try {
      const response = await axios.get<T>(`${baseUrl}${path}`, {
        params: {
          ...params,
          appid: this.configService.get<string>('OPENWEATHER_API_KEY'),
        },
        timeout: this.configService.get<number>('WEATHER_TIMEOUT_MS', 10000),
      });
      return response.data;
    } catch (error) {
      const upstreamError = toUpstreamError('weather', error);
      this.logger.warn(`GET ${path} failed: ${upstreamError.message}`);
      throw upstreamError;
    }
  }
}

export function describeConditions(conditions?: OpenWeatherCondition[]): string {
  return conditions?.[0]?.description ?? 'N/A';
}
