import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

/**
 * One DHT11 temperature/humidity sample.
 */
export interface SensorReading {
  readonly temperature: number;
  readonly humidity: number;
  readonly timestamp: string;
  readonly sensorId: string;
}

export type SensorStatus = 'online' | 'error';

export interface SensorSummary {
  totalReadings: number;
  latestTemperature: number;
  latestHumidity: number;
  averageTemperature: number;
  averageHumidity: number;
  timeRange: {
    start: string;
    end: string;
  };
}

export interface SensorLocation {
  city: string;
}

/**
 * What the IoT side hands to analysis: recent readings plus where they come from.
 */
export interface IotSnapshot {
  source: 'simulated';
  location: SensorLocation;
  summary: SensorSummary;
  readings: SensorReading[];
  sensorStatus: SensorStatus;
}

export interface IotAnalysisResult {
  success: boolean;
  data: IotSnapshot | null;
  analysis: string;
  timestamp: string;
}

export interface SensorStatusReport {
  sensor_status: SensorStatus;
  last_update: string | null;
  total_readings: number;
  mqtt_connected: boolean;
  mqtt_broker: string | null;
  topics: {
    temperature: string;
    humidity: string;
  };
}

export interface SensorFrame {
  sequence: number;
  reading: SensorReading | null;
  sensor_status: SensorStatus;
  timestamp: string;
}

export class AnalyzeSensorsDto {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsOptional()
  @IsString()
  city?: string;
}

export class SensorHistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number = 50;
}
