import { Injectable } from '@nestjs/common';
import { AnalysisService } from '../analysis/analysis.service';
import { WeatherAnalysisResult } from './weather.dto';
import { WEATHER_PROMPT } from './weather.prompts';
import { WeatherService } from './weather.service';

@Injectable()
export class WeatherAnalysisService {
  constructor(
    private readonly weatherService: WeatherService,
    private readonly analysisService: AnalysisService,
  ) {}

  /**
   * Fetch (or reuse) the reading for `city` and have it analyzed.
   * Upstream outages come back as `success: false` with an `error` field.
   */
  async analyze(
    city: string,
    query?: string,
    days = 1,
  ): Promise<WeatherAnalysisResult> {
    const outcome = await this.weatherService.getWeather(city, days);

    if (!outcome.ok) {
      return {
        success: false,
        city,
        weather_data: null,
        analysis: `No weather data available for ${city}.`,
        timestamp: new Date().toISOString(),
        error: outcome.message,
      };
    }

    const analysis = await this.analysisService.analyze(
      WEATHER_PROMPT,
      query?.trim() || `Weather analysis for ${city}`,
      outcome.value,
    );

    return {
      success: true,
      city,
      weather_data: outcome.value,
      analysis,
      timestamp: new Date().toISOString(),
    };
  }
}
