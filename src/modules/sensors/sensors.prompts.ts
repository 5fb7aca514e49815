import { PromptTemplate } from '../analysis/analysis.types';
import { IotSnapshot } from './sensor.types';

export const IOT_PROMPT: PromptTemplate<IotSnapshot> = {
  kind: 'iot',
  render: (query, snapshot) => {
    const { summary } = snapshot;
    return [
      `You are an IoT data analysis expert. Analyze the following data from a DHT11 temperature and humidity sensor in ${snapshot.location.city} and answer the user's query.`,
      '',
      'Sensor Data Summary:',
      `- Total readings: ${summary.totalReadings}`,
      `- Latest temperature: ${summary.latestTemperature}°C`,
      `- Latest humidity: ${summary.latestHumidity}%`,
      `- Average temperature: ${summary.averageTemperature.toFixed(1)}°C`,
      `- Average humidity: ${summary.averageHumidity.toFixed(1)}%`,
      `- Time range: ${summary.timeRange.start} to ${summary.timeRange.end}`,
      '',
      'Readings:',
      JSON.stringify(snapshot.readings, null, 2),
      '',
      `User Query: ${query}`,
      '',
      'Please provide:',
      '1. Comfort level assessment (comfortable, too hot, too cold, too humid, too dry)',
      '2. Recommendations for smart house climate control',
      '3. Any anomalies or patterns detected',
      '4. Energy efficiency suggestions',
      '',
      'Keep your response informative but concise.',
    ].join('\n');
  },
};
