import { z } from 'zod';

export const ForecastRecord = z.object({
  location: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  temperatureC: z.number().int(),
  temperatureF: z.number().int(),
  conditions: z.string(),
  precipitationProb: z.number().min(0).max(100),
  windSpeed: z.number().min(0),
  humidity: z.number().min(0).max(100),
});
export type ForecastRecordT = z.infer<typeof ForecastRecord>;
