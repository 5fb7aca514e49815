import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../modules/utils/upstream-error';

export const WEATHER_PROVIDERS = ['openweathermap', 'simulated'] as const;
export type WeatherProvider = (typeof WEATHER_PROVIDERS)[number];

// Reads the raw value: implicit conversion would already have turned "false" into true
function toBoolean({
  obj,
  key,
  value,
}: {
  obj: Record<string, unknown>;
  key: string;
  value: unknown;
}): unknown {
  const raw = obj[key];
  if (typeof raw === 'string') {
    if (raw.toLowerCase() === 'true') return true;
    if (raw.toLowerCase() === 'false') return false;
  }
  return value;
}

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsIn(['error', 'warn', 'log', 'debug', 'verbose'])
  LOG_LEVEL: string = 'log';

  @IsIn(WEATHER_PROVIDERS)
  WEATHER_PROVIDER: WeatherProvider = 'openweathermap';

  @IsOptional()
  @IsString()
  OPENWEATHER_API_KEY?: string;

  @IsUrl({ require_tld: false, allow_underscores: true })
  OPENWEATHER_BASE_URL: string = 'https://api.openweathermap.org';

  @IsInt()
  @Min(1)
  GEOCODER_TIMEOUT_MS: number = 5000;

  @IsInt()
  @Min(1)
  WEATHER_TIMEOUT_MS: number = 10000;

  @IsUrl({ require_tld: false, allow_underscores: true })
  OLLAMA_URL: string = 'http://localhost:11434';

  @IsString()
  OLLAMA_MODEL: string = 'gemma2:2b';

  @IsInt()
  @Min(1)
  LLM_TIMEOUT_MS: number = 30000;

  @IsInt()
  @Min(1)
  COMBINED_LLM_TIMEOUT_MS: number = 45000;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsInt()
  @Min(1)
  CACHE_MAX_ENTRIES: number = 1000;

  @IsInt()
  @Min(1)
  WEATHER_CACHE_TTL_SECONDS: number = 300;

  @IsInt()
  @Min(1)
  ANALYSIS_CACHE_TTL_SECONDS: number = 300;

  @IsInt()
  @Min(0)
  HTTP_CACHE_MAX_AGE_SECONDS: number = 300;

  @IsOptional()
  @IsString()
  MQTT_URL?: string;

  @IsString()
  MQTT_CLIENT_ID: string = 'iot_agent';

  @Transform(toBoolean)
  @IsBoolean()
  SENSOR_SIMULATION_ENABLED: boolean = true;

  @IsInt()
  @Min(100)
  SENSOR_INTERVAL_MS: number = 30000;

  @IsInt()
  @Min(1)
  SENSOR_HISTORY_LIMIT: number = 100;

  @IsInt()
  @Min(10)
  SSE_INTERVAL_MS: number = 1000;

  @IsString()
  HOME_CITY: string = 'Bengaluru';
}

/**
 * `validate` hook for ConfigModule. Throws {@link ConfigurationError} so the
 * application refuses to start on a missing or malformed setting.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }

  if (
    validated.WEATHER_PROVIDER === 'openweathermap' &&
    !validated.OPENWEATHER_API_KEY
  ) {
    throw new ConfigurationError(
      'OPENWEATHER_API_KEY is required when WEATHER_PROVIDER=openweathermap (set WEATHER_PROVIDER=simulated for demo mode)',
    );
  }

  return validated;
}
