import { createHash } from 'node:crypto';
import type { ForecastRecordT } from '../../schemas/forecast.js';
import { toIsoDate } from '../../util/dates.js';
import { celsiusToFahrenheit, type ForecastRequest, type WeatherProvider } from './providers.js';

/** Stable 10..29 °C reading per city, independent of process or platform. */
export function mockTemperatureC(city: string): number {
  const digest = createHash('sha256').update(city.trim().toLowerCase()).digest();
  return 10 + (digest.readUInt32BE(0) % 20);
}

/**
 * Offline provider used when no weather API key is configured.
 */
export class MockWeatherProvider implements WeatherProvider {
  readonly name = 'mock';

  constructor(private readonly now: () => Date = () => new Date()) {}

  async forecast(req: ForecastRequest): Promise<ForecastRecordT> {
    const temperatureC = mockTemperatureC(req.city);
    return {
      location: `${req.city}, ${req.country}`,
      date: toIsoDate(req.date ?? this.now()),
      temperatureC,
      temperatureF: celsiusToFahrenheit(temperatureC),
      conditions: 'partly cloudy',
      precipitationProb: 20,
      windSpeed: 15,
      humidity: 65,
    };
  }
}
