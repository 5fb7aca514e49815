import { Injectable, Logger } from '@nestjs/common';
import { WeatherService } from '../weather/weather.service';
import { Agent, AgentMessage, AgentReply, replyTo } from './agent-message';
import { IntentRouter } from './intent-router';
import { TimeService, capitalize } from './time.service';

export const WEATHER_AGENT_ID = 'weather';

export const KNOWN_CITIES = [
  'mumbai',
  'delhi',
  'bengaluru',
  'chennai',
  'kolkata',
  'hyderabad',
  'pune',
  'ahmedabad',
  'jaipur',
  'lucknow',
  'nagpur',
  'patna',
  'new york',
  'london',
  'tokyo',
] as const;

const CITY_PATTERN = new RegExp(`\\b(${KNOWN_CITIES.join('|')})\\b`, 'i');

export const MISSING_CITY_REPLY =
  "Please specify an Indian city to get weather information (e.g., 'What's the weather in Mumbai?').";

/**
 * Answers weather and local time questions for the cities it knows.
 */
@Injectable()
export class WeatherAgent implements Agent {
  readonly id = WEATHER_AGENT_ID;
  readonly description = 'Current weather and local time for known cities';
  private readonly logger = new Logger(WeatherAgent.name);

  private readonly router = new IntentRouter(
    [
      {
        name: 'local-time',
        pattern: /\btime\b/i,
        handle: (_match, message) => {
          const city = findCity(message.text);
          if (!city) {
            return 'Please tell me which city you want the time for.';
          }
          const lookup = this.timeService.currentTime(city);
          return lookup.status === 'success'
            ? lookup.report
            : lookup.error_message;
        },
      },
      {
        name: 'current-weather',
        pattern: CITY_PATTERN,
        handle: (match) => this.describeWeather(capitalize(match[1])),
      },
    ],
    () => MISSING_CITY_REPLY,
  );

  constructor(
    private readonly weatherService: WeatherService,
    private readonly timeService: TimeService,
  ) {}

  async handle(message: AgentMessage): Promise<AgentReply> {
    const { intent, text } = await this.router.route(message);
    this.logger.debug(
      `Query "${message.text}" from ${message.sender} handled as ${intent}`,
    );
    return { intent, message: replyTo(message, text) };
  }

  private async describeWeather(city: string): Promise<string> {
    const outcome = await this.weatherService.getWeather(city, 1);
    if (!outcome.ok) {
      return `Could not retrieve weather for ${city} from the API. Please check the city name or API status.`;
    }

    const { current } = outcome.value;
    return `The current weather in ${city} is ${current.description} with a temperature of ${current.temperature}°C.`;
  }
}

function findCity(text: string): string | null {
  const match = text.match(CITY_PATTERN);
  return match ? match[1] : null;
}
