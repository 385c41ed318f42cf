import { ForecastRecord, type ForecastRecordT } from '../../schemas/forecast.js';
import { fetchJSON, registerAllowedHost } from '../../util/fetch.js';
import { toIsoDate } from '../../util/dates.js';
import type { ToolLogger } from '../../util/logging.js';
import { WeatherUnavailableError, toWeatherUnavailable } from '../errors.js';
import {
  celsiusToFahrenheit,
  ForecastResponseSchema,
  GeocodeSchema,
  type ForecastEntry,
  type ForecastRequest,
  type WeatherProvider,
} from './providers.js';

const NOON_MS = 12 * 60 * 60 * 1000;

export type OpenWeatherMapOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  log?: ToolLogger;
  now?: () => Date;
};

/**
 * Picks the 3-hourly entry closest to the target instant. Earlier entries win ties.
 */
export function pickNearestEntry(list: readonly ForecastEntry[], target: Date): ForecastEntry | undefined {
  const targetSec = target.getTime() / 1000;
  let best: ForecastEntry | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const entry of list) {
    const distance = Math.abs(entry.dt - targetSec);
    if (distance < bestDistance) {
      best = entry;
      bestDistance = distance;
    }
  }
  return best;
}

export class OpenWeatherMapProvider implements WeatherProvider {
  readonly name = 'openweathermap';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(private readonly opts: OpenWeatherMapOptions) {
    this.baseUrl = (opts.baseUrl ?? 'https://api.openweathermap.org').replace(/\/$/, '');
    this.timeoutMs = opts.timeoutMs ?? 5000;
    this.now = opts.now ?? (() => new Date());
    registerAllowedHost(this.baseUrl);
  }

  async forecast(req: ForecastRequest): Promise<ForecastRecordT> {
    try {
      const place = await this.geocode(req.city, req.country);
      const forecast = await this.fetchForecast(place.lat, place.lon);

      // A requested day is matched at midday, otherwise the nearest slot to now.
      const target = req.date ? new Date(req.date.getTime() + NOON_MS) : this.now();
      const entry = pickNearestEntry(forecast.list, target);
      if (!entry) throw new WeatherUnavailableError('invalid forecast data');

      const temp = entry.main.temp;
      const record = ForecastRecord.safeParse({
        location: `${forecast.city.name}, ${req.country}`,
        date: toIsoDate(new Date(entry.dt * 1000)),
        temperatureC: Math.round(temp),
        temperatureF: celsiusToFahrenheit(temp),
        conditions: entry.weather[0]?.description ?? 'unknown conditions',
        precipitationProb: Math.round((entry.pop ?? 0) * 100),
        windSpeed: entry.wind.speed,
        humidity: entry.main.humidity,
      });
      if (!record.success) throw new WeatherUnavailableError('provider error: unexpected response');
      return record.data;
    } catch (err: unknown) {
      const failure = toWeatherUnavailable(err);
      this.opts.log?.warn({ provider: this.name, reason: failure.reason }, 'weather.forecast.failed');
      throw failure;
    }
  }

  private async geocode(city: string, country: string): Promise<{ lat: number; lon: number }> {
    const params = new URLSearchParams({ q: `${city},${country}`, limit: '1', appid: this.opts.apiKey });
    const url = `${this.baseUrl}/geo/1.0/direct?${params.toString()}`;
    this.opts.log?.debug({ city, country }, 'weather.geocode.request');
    const json = await fetchJSON(url, { timeoutMs: this.timeoutMs, target: 'owm.geocode' });
    const parsed = GeocodeSchema.safeParse(json);
    if (!parsed.success) throw new WeatherUnavailableError('provider error: unexpected response');
    const first = parsed.data[0];
    if (!first) throw new WeatherUnavailableError('location not found');
    return { lat: first.lat, lon: first.lon };
  }

  private async fetchForecast(lat: number, lon: number) {
    const params = new URLSearchParams({
      lat: String(lat),
      lon: String(lon),
      appid: this.opts.apiKey,
      units: 'metric',
    });
    const url = `${this.baseUrl}/data/2.5/forecast?${params.toString()}`;
    this.opts.log?.debug({ lat, lon }, 'weather.forecast.request');
    const json = await fetchJSON(url, { timeoutMs: this.timeoutMs, target: 'owm.forecast' });
    const parsed = ForecastResponseSchema.safeParse(json);
    if (!parsed.success) throw new WeatherUnavailableError('provider error: unexpected response');
    if (parsed.data.list.length === 0) throw new WeatherUnavailableError('invalid forecast data');
    return parsed.data;
  }
}
