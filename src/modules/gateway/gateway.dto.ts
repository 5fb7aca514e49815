import { Expose } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { IotAnalysisResult, IotSnapshot } from '../sensors/sensor.types';
import { WeatherAnalysisResult, WeatherReading } from '../weather/weather.dto';

export class MultiAgentQueryDto {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsString()
  @IsNotEmpty()
  city!: string;

  @Expose({ name: 'include_iot' })
  @IsOptional()
  @IsBoolean()
  includeIot?: boolean = true;

  @Expose({ name: 'include_weather' })
  @IsOptional()
  @IsBoolean()
  includeWeather?: boolean = true;
}

/**
 * Prompt input for the combined analysis. Only the branch payloads go in,
 * never their response timestamps, so identical data hashes to the same key.
 */
export interface CombinedInput {
  city: string;
  iot: { data: IotSnapshot | null; analysis: string } | null;
  weather: { weather_data: WeatherReading | null; analysis: string } | null;
}

export interface MultiAgentResponse {
  success: boolean;
  query: string;
  city: string;
  iot_data: IotAnalysisResult | null;
  weather_data: WeatherAnalysisResult | null;
  combined_analysis: string;
  timestamp: string;
}
