import { PromptTemplate } from '../analysis/analysis.types';
import { CombinedInput } from './gateway.dto';

/**
 * Correlation prompt over whichever branches produced data. A missing
 * branch is left out entirely rather than described as empty.
 */
export const COMBINED_PROMPT: PromptTemplate<CombinedInput> = {
  kind: 'combined',
  render: (query, { city, iot, weather }) => {
    const sections: string[] = [];

    if (iot) {
      sections.push(
        'IoT Data Analysis:',
        iot.analysis,
        '',
        'IoT Raw Data:',
        JSON.stringify(iot.data, null, 2),
        '',
      );
    }

    if (weather) {
      sections.push(
        'Weather Data Analysis:',
        weather.analysis,
        '',
        'Weather Raw Data:',
        JSON.stringify(weather.weather_data, null, 2),
        '',
      );
    }

    const sources = [iot && 'IoT sensor data', weather && 'weather conditions']
      .filter((source): source is string => Boolean(source))
      .join(' and ');

    return [
      `You are an expert data analyst. Analyze the following data for ${city} and provide comprehensive insights based on ${sources}.`,
      '',
      `User Query: ${query}`,
      '',
      ...sections,
      'Please provide:',
      iot && weather
        ? '1. Correlation between IoT sensor data and weather conditions'
        : '1. Key observations from the available data',
      '2. Environmental impact analysis',
      '3. Recommendations based on the available data',
      '4. Potential patterns or anomalies',
      `5. Actionable insights for ${city}`,
      '',
      'Keep the response comprehensive but concise.',
    ].join('\n');
  },
};
