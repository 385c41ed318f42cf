import type { ForecastRecordT } from '../../schemas/forecast.js';
import { daysBetween, parseIsoDate } from '../../util/dates.js';

function describeDay(date: string, now: Date): string {
  const day = parseIsoDate(date);
  if (!day) return `on ${date}`;
  const offset = daysBetween(now, day);
  if (offset === 0) return 'today';
  if (offset === 1) return 'tomorrow';
  const label = day.toLocaleDateString('en-US', {
    weekday: 'long',
    month: 'long',
    day: 'numeric',
    timeZone: 'UTC',
  });
  return `on ${label}`;
}

function precipitationAdvice(prob: number): string {
  if (prob > 50) return `There's a ${prob}% chance of rain - pack an umbrella! `;
  if (prob > 20) return `There's a ${prob}% chance of rain. `;
  return '';
}

function temperatureAdvice(c: number): string {
  if (c < 5) return 'It will be quite cold, so dress warmly.';
  if (c > 30) return 'It will be hot, so stay hydrated and consider light clothing.';
  return '';
}

/**
 * Renders a forecast as a conversational sentence, e.g.
 * "The weather in Berlin, Germany for your visit to TechVentures GmbH today will be
 * partly cloudy with temperatures around 5°C (41°F)."
 */
export function formatWeatherResponse(record: ForecastRecordT, partnerName?: string, now: Date = new Date()): string {
  let out = `The weather in ${record.location} `;
  if (partnerName) out += `for your visit to ${partnerName} `;
  out += `${describeDay(record.date, now)} `;
  out += `will be ${record.conditions} with temperatures around ${record.temperatureC}°C (${record.temperatureF}°F). `;
  out += precipitationAdvice(record.precipitationProb);
  out += temperatureAdvice(record.temperatureC);
  return out.trimEnd();
}
