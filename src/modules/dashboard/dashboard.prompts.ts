import { PromptTemplate } from '../analysis/analysis.types';
import { DashboardInput } from './dashboard.types';

function conditions({ city, indoor, outdoor }: DashboardInput): string[] {
  const lines = [`Location: ${city}`];
  if (indoor) {
    lines.push(
      `Indoor: ${indoor.temperature}°C, ${indoor.humidity}% humidity (measured ${indoor.timestamp})`,
    );
  }
  if (outdoor) {
    lines.push(
      `Outdoor: ${outdoor.temperature}°C (feels like ${outdoor.feelsLike}°C), ${outdoor.humidity}% humidity, ${outdoor.description}`,
    );
  }
  return lines;
}

function template(
  kind: string,
  instruction: string,
): PromptTemplate<DashboardInput> {
  return {
    kind,
    render: (query, input) =>
      [
        'You are a helpful home assistant.',
        '',
        ...conditions(input),
        '',
        query,
        instruction,
      ].join('\n'),
  };
}

export const BRIEFING_PROMPT = template(
  'briefing',
  'Answer in two or three sentences.',
);

export const ACTIVITY_PROMPT = template(
  'activity',
  'Suggest one activity that suits these conditions, in one or two sentences.',
);

export const CLOTHING_PROMPT = template(
  'clothing',
  'Suggest what to wear when going outside, in one or two sentences.',
);
