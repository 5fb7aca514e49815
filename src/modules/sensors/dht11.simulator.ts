import { Inject, Injectable } from '@nestjs/common';
import { RANDOM_SOURCE, RandomSource, round, uniform } from '../utils/random';
import { SensorReading } from './sensor.types';

const BASE_TEMPERATURE = 24;
const BASE_HUMIDITY = 60;
const TEMPERATURE_VARIANCE = 5;
const HUMIDITY_VARIANCE = 15;

// Measurement range of the DHT11 part
const TEMPERATURE_RANGE = { min: 0, max: 50 };
const HUMIDITY_RANGE = { min: 20, max: 95 };

export const SENSOR_ID = 'DHT11_001';

@Injectable()
export class Dht11Simulator {
  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  read(now: Date = new Date()): SensorReading {
    const temperature = clamp(
      BASE_TEMPERATURE +
        uniform(this.random, -TEMPERATURE_VARIANCE, TEMPERATURE_VARIANCE),
      TEMPERATURE_RANGE.min,
      TEMPERATURE_RANGE.max,
    );
    const humidity = clamp(
      BASE_HUMIDITY + uniform(this.random, -HUMIDITY_VARIANCE, HUMIDITY_VARIANCE),
      HUMIDITY_RANGE.min,
      HUMIDITY_RANGE.max,
    );

    return {
      temperature: round(temperature, 1),
      humidity: round(humidity, 1),
      timestamp: now.toISOString(),
      sensorId: SENSOR_ID,
    };
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
