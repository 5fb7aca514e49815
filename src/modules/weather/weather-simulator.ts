import { Inject, Injectable } from '@nestjs/common';
import {
  RANDOM_SOURCE,
  RandomSource,
  pick,
  randomInt,
  round,
  uniform,
} from '../utils/random';
import { ForecastPoint, HistoricalReading, WeatherReading } from './weather.dto';

const CONDITIONS = [
  'clear sky',
  'few clouds',
  'overcast clouds',
  'light rain',
  'thunderstorm',
] as const;

const AIR_QUALITY = ['Good', 'Moderate', 'Poor'] as const;

const FORECAST_STEP_HOURS = 3;

/**
 * Synthetic weather used when WEATHER_PROVIDER=simulated.
 * Every reading it produces is tagged `source: 'simulated'`.
 */
@Injectable()
export class WeatherSimulator {
  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  generate(city: string, days: number, now: Date = new Date()): WeatherReading {
    const forecast: ForecastPoint[] = [];
    for (let step = 1; step <= days * (24 / FORECAST_STEP_HOURS); step++) {
      forecast.push({
        time: new Date(
          now.getTime() + step * FORECAST_STEP_HOURS * 3600 * 1000,
        ).toISOString(),
        temperature: round(uniform(this.random, 18, 38), 1),
        humidity: randomInt(this.random, 40, 80),
        description: pick(this.random, CONDITIONS),
        precipitationProbability: randomInt(this.random, 0, 80),
      });
    }

    return {
      source: 'simulated',
      city,
      country: null,
      coordinates: null,
      current: {
        temperature: round(uniform(this.random, 20, 35), 1),
        feelsLike: round(uniform(this.random, 22, 37), 1),
        humidity: randomInt(this.random, 40, 80),
        pressure: randomInt(this.random, 995, 1025),
        windSpeed: round(uniform(this.random, 0, 20), 1),
        description: pick(this.random, CONDITIONS),
      },
      forecast,
      airQuality: {
        aqi: randomInt(this.random, 50, 150),
        quality: pick(this.random, AIR_QUALITY),
      },
      capturedAt: now.toISOString(),
    };
  }

  generateHistorical(
    city: string,
    dt: number,
    now: Date = new Date(),
  ): HistoricalReading {
    return {
      source: 'simulated',
      city,
      coordinates: null,
      requestedAt: dt,
      observedAt: dt,
      temperature: round(uniform(this.random, 15, 35), 1),
      humidity: randomInt(this.random, 40, 80),
      pressure: randomInt(this.random, 995, 1025),
      windSpeed: round(uniform(this.random, 0, 20), 1),
      description: pick(this.random, CONDITIONS),
      capturedAt: now.toISOString(),
    };
  }
}
