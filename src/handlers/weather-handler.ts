import { ValidationError } from '../errors/index';
import { formatTimestamp } from '../output/timestamp';
import { systemClock, type Clock, type Handler, type WeatherInput } from './types';

export const EMPTY_LOCATION_MESSAGE = 'Please enter a valid location.';

export type RiskLevel = 'Low' | 'Moderate' | 'High';

export const WEATHER_ADVISORIES: Readonly<Record<RiskLevel, string>> = {
  Low: 'Minor weather concerns, standard precautions advised.',
  Moderate: 'Potential for severe weather. Prepare emergency kit and stay informed.',
  High: 'Extreme weather warning. Immediate protective actions recommended.',
};

// No forecast source is wired in; every location gets this tier.
export const FIXED_RISK_LEVEL: RiskLevel = 'Moderate';

/**
 * Upper-cases the first letter of every word and lower-cases the rest.
 * Any non-letter starts a new word.
 */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match: string, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function createWeatherHandler(now: Clock = systemClock): Handler<WeatherInput> {
  return async ({ location }) => {
    const trimmed = location.trim();
    if (!trimmed) {
      return { ok: false, error: new ValidationError(EMPTY_LOCATION_MESSAGE) };
    }

    const text = [
      `🌦️ Weather Prediction for ${toTitleCase(trimmed)}`,
      `Risk Level: ${FIXED_RISK_LEVEL}`,
      WEATHER_ADVISORIES[FIXED_RISK_LEVEL],
      '',
      `🕒 Generated: ${formatTimestamp(now())}`,
      '⚠️ Always cross-check with local meteorological services',
    ].join('\n');
    return { ok: true, text };
  };
}
