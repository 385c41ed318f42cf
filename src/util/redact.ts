/**
 * Redaction utilities for logs. Replaces dates and place names in strings.
 * Place and date redaction is disabled when LOG_LEVEL=debug to aid local
 * debugging; credentials in query strings and auth headers are always masked.
 */

const SECRET_PARAM = /\b(appid|api_key|apikey|key)=[^&\s"]+/gi;
const BEARER = /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g;

export function scrubSecrets(input: string): string {
  return input.replace(SECRET_PARAM, '$1=[REDACTED]').replace(BEARER, 'Bearer [REDACTED]');
}

function scrubString(input: string): string {
  let out = scrubSecrets(input);
  out = out.replace(/\b\d{4}-\d{2}-\d{2}\b/g, '[REDACTED_DATE]');
  // "in Berlin", "to New York", "at Acme Corp"
  out = out.replace(/\b(in|to|at)\s+[A-Z][A-Za-z-]*(?:\s+[A-Z][A-Za-z-]*)*/g, '$1 [REDACTED_PLACE]');
  return out;
}

function mapStrings(value: unknown, fn: (s: string) => string, seen: WeakSet<object>): unknown {
  if (typeof value === 'string') return fn(value);
  if (typeof value !== 'object' || value === null) return value;
  // pino serializes errors itself
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => mapStrings(v, fn, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = mapStrings(v, fn, seen);
  }
  return out;
}

/**
 * Scrub PII-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  return mapStrings(arg, enabled ? scrubString : scrubSecrets, new WeakSet<object>());
}

export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : scrubSecrets(msg);
}
