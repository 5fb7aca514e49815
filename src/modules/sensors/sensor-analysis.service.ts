import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisService } from '../analysis/analysis.service';
import { round } from '../utils/random';
import { SensorStoreService } from './sensor-store.service';
import {
  IotAnalysisResult,
  IotSnapshot,
  SensorReading,
  SensorSummary,
} from './sensor.types';
import { IOT_PROMPT } from './sensors.prompts';

const ANALYSIS_WINDOW = 10;

export const NO_SENSOR_DATA = 'No sensor data available for analysis yet.';

@Injectable()
export class SensorAnalysisService {
  constructor(
    private readonly store: SensorStoreService,
    private readonly analysisService: AnalysisService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * The most recent readings and their summary, or `null` before the first
   * sample has been taken.
   */
  getSnapshot(city?: string): IotSnapshot | null {
    const readings = this.store.getHistory(ANALYSIS_WINDOW);
    const summary = summarize(readings);
    if (!summary) {
      return null;
    }

    return {
      source: 'simulated',
      location: {
        city: city?.trim() || this.configService.get<string>('HOME_CITY', 'Bengaluru'),
      },
      summary,
      readings,
      sensorStatus: this.store.getStatus(),
    };
  }

  async analyze(query: string, city?: string): Promise<IotAnalysisResult> {
    const snapshot = this.getSnapshot(city);

    if (!snapshot) {
      return {
        success: false,
        data: null,
        analysis: NO_SENSOR_DATA,
        timestamp: new Date().toISOString(),
      };
    }

    const analysis = await this.analysisService.analyze(
      IOT_PROMPT,
      query,
      snapshot,
    );

    return {
      success: true,
      data: snapshot,
      analysis,
      timestamp: new Date().toISOString(),
    };
  }
}

export function summarize(readings: SensorReading[]): SensorSummary | null {
  const first = readings[0];
  const last = readings[readings.length - 1];
  if (!first || !last) {
    return null;
  }

  const total = (pick: (reading: SensorReading) => number): number =>
    readings.reduce((sum, reading) => sum + pick(reading), 0);

  return {
    totalReadings: readings.length,
    latestTemperature: last.temperature,
    latestHumidity: last.humidity,
    averageTemperature: round(total((r) => r.temperature) / readings.length, 2),
    averageHumidity: round(total((r) => r.humidity) / readings.length, 2),
    timeRange: {
      start: first.timestamp,
      end: last.timestamp,
    },
  };
}
