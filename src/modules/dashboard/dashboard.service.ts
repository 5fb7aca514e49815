import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisService } from '../analysis/analysis.service';
import { SensorStoreService } from '../sensors/sensor-store.service';
import { WeatherService } from '../weather/weather.service';
import {
  ACTIVITY_PROMPT,
  BRIEFING_PROMPT,
  CLOTHING_PROMPT,
} from './dashboard.prompts';
import { DashboardData, DashboardInput } from './dashboard.types';

const NOT_AVAILABLE = 'N/A';

@Injectable()
export class DashboardService {
  constructor(
    private readonly store: SensorStoreService,
    private readonly weatherService: WeatherService,
    private readonly analysisService: AnalysisService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Indoor sensor, outdoor weather and three short suggestions for the home
   * city. Each part degrades on its own.
   */
  async getDashboard(): Promise<DashboardData> {
    const city = this.configService.get<string>('HOME_CITY', 'Bengaluru');
    const indoor = this.store.getCurrent();
    const outcome = await this.weatherService.getWeather(city, 1);
    const outdoor = outcome.ok ? outcome.value.current : null;

    const input: DashboardInput = { city, indoor, outdoor };
    const [briefing, activity, clothing] =
      indoor || outdoor
        ? await Promise.all([
            this.analysisService.analyze(
              BRIEFING_PROMPT,
              'Give a short briefing on the current indoor and outdoor conditions.',
              input,
            ),
            this.analysisService.analyze(
              ACTIVITY_PROMPT,
              'What should I do today?',
              input,
            ),
            this.analysisService.analyze(
              CLOTHING_PROMPT,
              'What should I wear today?',
              input,
            ),
          ])
        : [
            'No briefing available.',
            'No activity suggestion available.',
            'No clothing suggestion available.',
          ];

    return {
      city,
      indoor_temp: indoor?.temperature ?? NOT_AVAILABLE,
      indoor_humidity: indoor?.humidity ?? NOT_AVAILABLE,
      outdoor_temp: outdoor?.temperature ?? NOT_AVAILABLE,
      outdoor_humidity: outdoor?.humidity ?? NOT_AVAILABLE,
      outdoor_conditions: outdoor?.description ?? NOT_AVAILABLE,
      llm_briefing: briefing,
      llm_activity_suggestion: activity,
      llm_clothing_suggestion: clothing,
      error_message: outcome.ok ? null : outcome.message,
    };
  }
}
