import { z } from 'zod';
import type { ForecastRecordT } from '../../schemas/forecast.js';

export interface ForecastRequest {
  city: string;
  country: string;
  /** UTC midnight of the requested day; absent means "now". */
  date?: Date;
}

export interface WeatherProvider {
  readonly name: 'mock' | 'openweathermap';
  forecast(req: ForecastRequest): Promise<ForecastRecordT>;
}

export function celsiusToFahrenheit(c: number): number {
  return Math.round((c * 9) / 5 + 32);
}

export const GeocodeSchema = z.array(
  z.object({
    name: z.string(),
    lat: z.number(),
    lon: z.number(),
    country: z.string().optional(),
  }),
);

export const ForecastEntrySchema = z.object({
  dt: z.number(),
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(z.object({ description: z.string() })),
  wind: z.object({ speed: z.number() }),
  pop: z.number().optional(),
});
export type ForecastEntry = z.infer<typeof ForecastEntrySchema>;

export const ForecastResponseSchema = z.object({
  list: z.array(ForecastEntrySchema),
  city: z.object({ name: z.string(), country: z.string().optional() }),
});
