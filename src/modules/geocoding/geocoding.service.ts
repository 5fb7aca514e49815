import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { toUpstreamError } from '../utils/upstream-error';
import { Coordinates, OpenWeatherGeocodeResult } from './geocoding.types';

/**
 * Resolves a city name to coordinates with a single, short-timeout lookup.
 * HTTP errors, network failures and empty results all come back as `null`.
 */
@Injectable()
export class GeocodingService {
  private readonly logger = new Logger(GeocodingService.name);

  constructor(private readonly configService: ConfigService) {}

  async resolve(city: string): Promise<Coordinates | null> {
    const name = city.trim();
    if (!name) {
      return null;
    }

    const baseUrl = this.configService.get<string>(
      'OPENWEATHER_BASE_URL',
      'https://api.openweathermap.org',
    );

    try {
      const response = await axios.get<OpenWeatherGeocodeResult[]>(
        `${baseUrl}/geo/1.0/direct`,
        {
          params: {
            q: name,
            limit: 1,
            appid: this.configService.get<string>('OPENWEATHER_API_KEY'),
          },
          timeout: this.configService.get<number>('GEOCODER_TIMEOUT_MS', 5000),
        },
      );

      const [first] = Array.isArray(response.data) ? response.data : [];
      if (!first) {
        this.logger.warn(`No geocoding result for "${name}"`);
        return null;
      }

      this.logger.debug(
        `Geocoded "${name}" to (${first.lat}, ${first.lon})`,
      );
      return { latitude: first.lat, longitude: first.lon };
    } catch (error) {
      const upstreamError = toUpstreamError('geocoder', error);
      this.logger.warn(
        `Geocoding failed for "${name}": ${upstreamError.message}`,
      );
      return null;
    }
  }
}
