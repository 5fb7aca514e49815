import { SensorReading } from '../sensors/sensor.types';
import { CurrentConditions } from '../weather/weather.dto';

export type Measurement = number | 'N/A';

export interface DashboardData {
  city: string;
  indoor_temp: Measurement;
  indoor_humidity: Measurement;
  outdoor_temp: Measurement;
  outdoor_humidity: Measurement;
  outdoor_conditions: string;
  llm_briefing: string;
  llm_activity_suggestion: string;
  llm_clothing_suggestion: string;
  error_message: string | null;
}

export interface DashboardInput {
  city: string;
  indoor: SensorReading | null;
  outdoor: CurrentConditions | null;
}
