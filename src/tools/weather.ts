import type { AgentConfig } from '../config/agent.js';
import { daysBetween, parseIsoDate } from '../util/dates.js';
import type { ToolLogger } from '../util/logging.js';
import { WeatherUnavailableError } from './errors.js';
import { formatWeatherResponse } from './weather/format.js';
import { MockWeatherProvider } from './weather/mock.js';
import { OpenWeatherMapProvider } from './weather/openweathermap.js';
import type { WeatherProvider } from './weather/providers.js';

export const MAX_FORECAST_DAYS = 7;

export const INVALID_LOCATION_MESSAGE =
  "Invalid location format. Please provide location as 'City, Country' (e.g., 'Berlin, Germany')";

export const INVALID_DATE_MESSAGE =
  'Date must be within the next 7 days. Weather forecasts are only available for the next week.';

export type Place = { city: string; country: string };

/**
 * Accepts exactly "City, Country": one comma, two non-empty segments.
 */
export function parseLocation(location: string): Place | null {
  const parts = location.split(',');
  if (parts.length !== 2) return null;
  const [city, country] = parts.map((p) => p.trim());
  if (!city || !country) return null;
  return { city, country };
}

/**
 * True when `value` is an ISO calendar date between today and today + 7 days inclusive.
 */
export function validateForecastDate(value: string, now: Date = new Date()): boolean {
  const day = parseIsoDate(value);
  if (!day) return false;
  const offset = daysBetween(now, day);
  return offset >= 0 && offset <= MAX_FORECAST_DAYS;
}

export function createWeatherProvider(cfg: AgentConfig['weather'], log?: ToolLogger): WeatherProvider {
  if (!cfg.apiKey) {
    log?.info({ provider: 'mock' }, 'weather.provider.selected');
    return new MockWeatherProvider();
  }
  log?.info({ provider: 'openweathermap' }, 'weather.provider.selected');
  return new OpenWeatherMapProvider({ apiKey: cfg.apiKey, baseUrl: cfg.baseUrl, timeoutMs: cfg.timeoutMs, log });
}

export type WeatherLookupInput = {
  location: string;
  date?: string;
  partnerName?: string;
};

/**
 * Weather tool body. Input problems and provider outages come back as text
 * for the model; anything else propagates.
 */
export async function getWeatherForecast(
  provider: WeatherProvider,
  input: WeatherLookupInput,
  opts: { log?: ToolLogger; now?: Date } = {},
): Promise<string> {
  const now = opts.now ?? new Date();
  const place = parseLocation(input.location);
  if (!place) {
    opts.log?.debug({ reason: 'location_format' }, 'weather.input.rejected');
    return INVALID_LOCATION_MESSAGE;
  }

  let date: Date | undefined;
  const rawDate = input.date?.trim();
  if (rawDate) {
    if (!validateForecastDate(rawDate, now)) {
      opts.log?.debug({ reason: 'date_window' }, 'weather.input.rejected');
      return INVALID_DATE_MESSAGE;
    }
    date = parseIsoDate(rawDate) ?? undefined;
  }

  try {
    const record = await provider.forecast({ ...place, date });
    return formatWeatherResponse(record, input.partnerName, now);
  } catch (err: unknown) {
    if (err instanceof WeatherUnavailableError) {
      return `Unable to retrieve weather data: ${err.reason}. Please try again later.`;
    }
    throw err;
  }
}
