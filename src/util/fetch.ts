import { fetch as undiciFetch } from 'undici';
import { observeExternal, type ExternalStatus } from './metrics.js';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';

const log = createLogger();

export type FetchErrorKind = 'timeout' | 'http' | 'network';

export class ExternalFetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status?: number;
  constructor(kind: FetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

// Hosts of configured services are added at construction time.
const ALLOWLIST = new Set<string>(['api.openweathermap.org']);

export function registerAllowedHost(urlOrHost: string): void {
  try {
    ALLOWLIST.add(new URL(urlOrHost).hostname);
  } catch {
    ALLOWLIST.add(urlOrHost);
  }
}

export function isAllowedHost(host: string): boolean {
  return ALLOWLIST.has(host);
}

type RequestShape = {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
};

type ResponseShape = { ok: boolean; status: number; text(): Promise<string> };

// Tests stub the global fetch; everything else goes through undici.
function send(url: string, init: RequestShape): Promise<ResponseShape> {
  if (process.env.NODE_ENV === 'test') {
    return globalThis.fetch(url, init);
  }
  return undiciFetch(url, init);
}

export type FetchJSONOptions = {
  method?: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  target?: string;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function statusLabel(err: ExternalFetchError): ExternalStatus {
  if (err.kind === 'timeout') return 'timeout';
  if (err.kind === 'http') return err.status !== undefined && err.status >= 500 ? '5xx' : '4xx';
  return 'network';
}

function resolveHost(url: string): string {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!ALLOWLIST.has(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }
  return host;
}

async function attempt(url: string, opts: FetchJSONOptions, timeoutMs: number, target: string): Promise<unknown> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  const headers: Record<string, string> = { Accept: 'application/json', ...opts.headers };
  let body: string | undefined;
  if (opts.body !== undefined) {
    body = JSON.stringify(opts.body);
    headers['Content-Type'] = 'application/json';
  }
  const method = opts.method ?? (body === undefined ? 'GET' : 'POST');

  try {
    log.debug({ target, method, url }, 'fetch.request');
    const res = await send(url, { method, headers, body, signal: ac.signal });
    log.debug({ target, status: res.status }, 'fetch.response');
    if (!res.ok) {
      throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
    }
    const text = await res.text();
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new ExternalFetchError('network', 'json_parse_error');
    }
  } catch (err: unknown) {
    if (err instanceof ExternalFetchError) throw err;
    if (ac.signal.aborted) {
      log.debug({ target, timeoutMs }, 'fetch.timeout');
      throw new ExternalFetchError('timeout', 'timeout');
    }
    throw new ExternalFetchError('network', errorMessage(err));
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetches and parses JSON with a hard timeout. Calls are scheduled through a
 * per-host limiter and are never retried.
 */
export async function fetchJSON(url: string, opts: FetchJSONOptions = {}): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? 5000;
  const target = opts.target ?? 'unknown';
  const host = resolveHost(url);
  const start = Date.now();

  try {
    const result = await scheduleWithLimit(host, () => attempt(url, opts, timeoutMs, target));
    observeExternal({ target, status: 'ok' }, Date.now() - start);
    return result;
  } catch (err: unknown) {
    const failure = err instanceof ExternalFetchError ? err : new ExternalFetchError('network', errorMessage(err));
    observeExternal({ target, status: statusLabel(failure) }, Date.now() - start);
    log.debug({ target, kind: failure.kind, status: failure.status, reason: failure.message }, 'fetch.failed');
    throw failure;
  }
}
