import { Injectable } from '@nestjs/common';

const CITY_TIMEZONES: Record<string, string> = {
  'new york': 'America/New_York',
  london: 'Europe/London',
  tokyo: 'Asia/Tokyo',
  mumbai: 'Asia/Kolkata',
  delhi: 'Asia/Kolkata',
  bengaluru: 'Asia/Kolkata',
  chennai: 'Asia/Kolkata',
  kolkata: 'Asia/Kolkata',
};

export type TimeLookup =
  | { status: 'success'; report: string }
  | { status: 'error'; error_message: string };

@Injectable()
export class TimeService {
  get cities(): string[] {
    return Object.keys(CITY_TIMEZONES);
  }

  currentTime(city: string, now: Date = new Date()): TimeLookup {
    const timeZone = CITY_TIMEZONES[city.trim().toLowerCase()];

    if (!timeZone) {
      return {
        status: 'error',
        error_message:
          `Sorry, I don't have timezone information for '${city}'. ` +
          'Try New York, London, Tokyo, or any major Indian city like Mumbai, Delhi, Bengaluru, Chennai, or Kolkata.',
      };
    }

    const parts = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    }).formatToParts(now);
    const part = (type: Intl.DateTimeFormatPartTypes): string =>
      parts.find((p) => p.type === type)?.value ?? '';

    const stamp = `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
    return {
      status: 'success',
      report: `The current time in ${capitalize(city.trim())} is ${stamp} (${timeZone})`,
    };
  }
}

export function capitalize(value: string): string {
  return value
    .split(/\s+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
