import { PromptTemplate } from '../analysis/analysis.types';
import { WeatherReading } from './weather.dto';

export const WEATHER_PROMPT: PromptTemplate<WeatherReading> = {
  kind: 'weather',
  render: (query, reading) =>
    [
      `You are a meteorologist and weather analysis expert. Analyze the following weather data for ${reading.city} and answer the user's query.`,
      '',
      'Weather Data:',
      JSON.stringify(reading, null, 2),
      '',
      `User Query: ${query}`,
      '',
      'Please provide analysis including:',
      '1. Current conditions summary',
      '2. Weather trends and patterns',
      '3. Recommendations for activities',
      '4. Health and safety considerations',
      '5. Forecast insights',
      '',
      'Keep your response informative and practical.',
    ].join('\n'),
};
