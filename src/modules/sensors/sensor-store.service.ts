import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SensorReading, SensorStatus } from './sensor.types';

/**
 * In-process sensor state. History keeps only the most recent
 * SENSOR_HISTORY_LIMIT readings.
 */
@Injectable()
export class SensorStoreService {
  private readings: SensorReading[] = [];
  private status: SensorStatus = 'online';
  private lastUpdate: Date | null = null;

  constructor(private readonly configService: ConfigService) {}

  private get historyLimit(): number {
    return this.configService.get<number>('SENSOR_HISTORY_LIMIT', 100);
  }

  record(reading: SensorReading): void {
    this.readings.push(reading);
    if (this.readings.length > this.historyLimit) {
      this.readings = this.readings.slice(-this.historyLimit);
    }
    this.lastUpdate = new Date();
    this.status = 'online';
  }

  markError(): void {
    this.status = 'error';
  }

  getCurrent(): SensorReading | null {
    return this.readings[this.readings.length - 1] ?? null;
  }

  getHistory(limit?: number): SensorReading[] {
    if (limit === undefined) {
      return [...this.readings];
    }
    return limit > 0 ? this.readings.slice(-limit) : [];
  }

  getStatus(): SensorStatus {
    return this.status;
  }

  getLastUpdate(): Date | null {
    return this.lastUpdate;
  }

  count(): number {
    return this.readings.length;
  }
}
