import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { Coordinates } from '../geocoding/geocoding.types';

export type ReadingSource = 'live' | 'simulated';

export interface CurrentConditions {
  readonly temperature: number;
  readonly feelsLike: number;
  readonly humidity: number;
  readonly pressure: number;
  readonly windSpeed: number;
  readonly description: string;
}

export interface ForecastPoint {
  readonly time: string;
  readonly temperature: number;
  readonly humidity: number;
  readonly description: string;
  readonly precipitationProbability: number;
}

export interface AirQuality {
  readonly aqi: number;
  readonly quality: string;
}

/**
 * Weather for one city captured at `capturedAt`. Never mutated after creation.
 */
export interface WeatherReading {
  readonly source: ReadingSource;
  readonly city: string;
  readonly country: string | null;
  readonly coordinates: Coordinates | null;
  readonly current: CurrentConditions;
  readonly forecast: readonly ForecastPoint[];
  readonly airQuality?: AirQuality;
  readonly capturedAt: string;
}

export interface HistoricalReading {
  readonly source: ReadingSource;
  readonly city: string;
  readonly coordinates: Coordinates | null;
  readonly requestedAt: number;
  readonly observedAt: number;
  readonly temperature: number;
  readonly humidity: number;
  readonly pressure: number;
  readonly windSpeed: number;
  readonly description: string;
  readonly capturedAt: string;
}

export interface WeatherAnalysisResult {
  success: boolean;
  city: string;
  weather_data: WeatherReading | null;
  analysis: string;
  timestamp: string;
  error?: string;
}

export interface WeatherLookupResponse<T> {
  success: boolean;
  city: string;
  data: T | null;
  error?: string;
}

export const MAX_FORECAST_DAYS = 5;

export class AnalyzeWeatherDto {
  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsOptional()
  @IsString()
  query?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_FORECAST_DAYS)
  days?: number = 1;
}

export class WeatherQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_FORECAST_DAYS)
  days?: number = 1;
}

export class WeatherHistoryQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  dt!: number;
}
