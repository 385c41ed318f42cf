import Bottleneck from 'bottleneck';

export type LimiterStats = { queued: number; running: number };

const pools = new Map<string, Bottleneck>();

function envNumber(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

function getConfig(host: string) {
  const defaultMinTime = envNumber('EXT_RATE_MIN_TIME_MS', 100, 0);
  const defaultMaxConcurrency = envNumber('EXT_RATE_MAX_CONCURRENCY', 4, 1);

  // Per-host overrides, e.g. RATE_MIN_MS_API_OPENWEATHERMAP_ORG
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  return {
    minTime: envNumber(`RATE_MIN_MS_${hostKey}`, defaultMinTime, 0),
    maxConcurrent: envNumber(`RATE_MAX_CONC_${hostKey}`, defaultMaxConcurrency, 1),
  };
}

export function getLimiter(host: string): Bottleneck {
  const existing = pools.get(host);
  if (existing) return existing;
  const limiter = new Bottleneck(getConfig(host));
  pools.set(host, limiter);
  return limiter;
}

export async function scheduleWithLimit<T>(host: string, fn: () => Promise<T>): Promise<T> {
  return getLimiter(host).schedule(() => fn());
}

export function getLimiterStats(host: string): LimiterStats | null {
  const limiter = pools.get(host);
  if (!limiter) return null;
  const counts = limiter.counts();
  return { queued: limiter.queued(), running: counts.RUNNING + counts.EXECUTING };
}
