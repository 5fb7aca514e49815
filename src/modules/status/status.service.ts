import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { WeatherProvider } from '../../config/environment';
import { LlmService } from '../analysis/llm.service';
import { MqttService } from '../mqtt/mqtt.service';
import { CacheService } from '../utils/cache.service';

export interface ServiceStatus {
  status: 'running';
  version: string;
  timestamp: string;
  model: string;
  weather_provider: WeatherProvider;
  weather_api_configured: boolean;
  connections: {
    llm: boolean;
    cache: boolean;
    mqtt: boolean;
  };
  capabilities: string[];
}

const CAPABILITIES = [
  'Weather data collection',
  'Forecast and historical lookups',
  'IoT sensor simulation',
  'Real-time sensor streaming',
  'LLM-backed weather and IoT analysis',
  'Combined multi-source analysis',
];

@Injectable()
export class StatusService {
  private version: string;

  constructor(
    private readonly llmService: LlmService,
    private readonly cacheService: CacheService,
    private readonly mqttService: MqttService,
    private readonly configService: ConfigService,
  ) {
    try {
      const packageJsonPath = join(process.cwd(), 'package.json');
      const packageJson: { version?: string } = JSON.parse(
        readFileSync(packageJsonPath, 'utf8'),
      );
      this.version = packageJson.version || 'unknown';
    } catch {
      this.version = 'unknown';
    }
  }

  getHealth(): { status: 'healthy'; timestamp: string } {
    return { status: 'healthy', timestamp: new Date().toISOString() };
  }

  /**
   * Capability and connectivity summary. Probes run concurrently and each
   * reports `false` instead of failing.
   */
  async getStatus(): Promise<ServiceStatus> {
    const [llm, cache] = await Promise.all([
      this.llmService.isReachable(),
      this.cacheService.isAvailable(),
    ]);

    return {
      status: 'running',
      version: this.version,
      timestamp: new Date().toISOString(),
      model: this.llmService.model,
      weather_provider: this.configService.get<WeatherProvider>(
        'WEATHER_PROVIDER',
        'openweathermap',
      ),
      weather_api_configured: Boolean(
        this.configService.get<string>('OPENWEATHER_API_KEY'),
      ),
      connections: {
        llm,
        cache,
        mqtt: this.mqttService.isConnected(),
      },
      capabilities: CAPABILITIES,
    };
  }
}
