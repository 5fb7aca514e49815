import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisService } from '../analysis/analysis.service';
import { NO_ANALYSIS } from '../analysis/analysis.types';
import { SensorAnalysisService } from '../sensors/sensor-analysis.service';
import { IotAnalysisResult } from '../sensors/sensor.types';
import { WeatherAnalysisService } from '../weather/weather-analysis.service';
import { WeatherAnalysisResult } from '../weather/weather.dto';
import { MultiAgentResponse } from './gateway.dto';
import { COMBINED_PROMPT } from './gateway.prompts';

export interface MultiAgentQuery {
  query: string;
  city: string;
  includeIot: boolean;
  includeWeather: boolean;
}

/**
 * Fans a query out to the IoT and weather branches concurrently and
 * combines whatever came back. A failed branch contributes `null`.
 */
@Injectable()
export class GatewayService {
  private readonly logger = new Logger(GatewayService.name);

  constructor(
    private readonly sensorAnalysisService: SensorAnalysisService,
    private readonly weatherAnalysisService: WeatherAnalysisService,
    private readonly analysisService: AnalysisService,
    private readonly configService: ConfigService,
  ) {}

  async query(request: MultiAgentQuery): Promise<MultiAgentResponse> {
    const [iotResult, weatherResult] = await Promise.allSettled([
      request.includeIot
        ? this.sensorAnalysisService.analyze(request.query, request.city)
        : Promise.resolve(null),
      request.includeWeather
        ? this.weatherAnalysisService.analyze(request.city, request.query)
        : Promise.resolve(null),
    ]);

    const iot = this.settle<IotAnalysisResult>('IoT', iotResult);
    const weather = this.settle<WeatherAnalysisResult>('Weather', weatherResult);

    let combinedAnalysis = NO_ANALYSIS;
    if (iot || weather) {
      combinedAnalysis = await this.analysisService.analyze(
        COMBINED_PROMPT,
        request.query,
        {
          city: request.city,
          iot: iot && { data: iot.data, analysis: iot.analysis },
          weather: weather && {
            weather_data: weather.weather_data,
            analysis: weather.analysis,
          },
        },
        {
          timeoutMs: this.configService.get<number>(
            'COMBINED_LLM_TIMEOUT_MS',
            45000,
          ),
        },
      );
    }

    return {
      success: true,
      query: request.query,
      city: request.city,
      iot_data: iot,
      weather_data: weather,
      combined_analysis: combinedAnalysis,
      timestamp: new Date().toISOString(),
    };
  }

  private settle<T extends { success: boolean }>(
    branch: string,
    result: PromiseSettledResult<T | null>,
  ): T | null {
    if (result.status === 'rejected') {
      this.logger.error(
        `${branch} branch failed: ${result.reason instanceof Error ? result.reason.message : String(result.reason)}`,
      );
      return null;
    }

    const value = result.value;
    if (value && !value.success) {
      this.logger.warn(`${branch} branch returned no data`);
      return null;
    }
    return value;
  }
}
