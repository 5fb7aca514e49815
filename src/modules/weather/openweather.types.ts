export interface OpenWeatherCondition {
  id: number;
  main: string;
  description: string;
  icon: string;
}

export interface OpenWeatherCurrentResponse {
  coord?: { lon: number; lat: number };
  weather?: OpenWeatherCondition[];
  main?: {
    temp: number;
    feels_like: number;
    pressure: number;
    humidity: number;
  };
  wind?: { speed: number; deg?: number };
  sys?: { country?: string };
  dt?: number;
  name?: string;
  cod?: number | string;
}

export interface OpenWeatherForecastItem {
  dt: number;
  dt_txt?: string;
  main: { temp: number; humidity: number };
  weather?: OpenWeatherCondition[];
  pop?: number;
}

export interface OpenWeatherForecastResponse {
  cnt?: number;
  list?: OpenWeatherForecastItem[];
}

export interface OpenWeatherHistoricalPoint {
  dt: number;
  temp: number;
  humidity: number;
  pressure: number;
  wind_speed: number;
  weather?: OpenWeatherCondition[];
}

export interface OpenWeatherTimemachineResponse {
  lat: number;
  lon: number;
  timezone?: string;
  data?: OpenWeatherHistoricalPoint[];
}
