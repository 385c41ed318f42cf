import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/** The subset of the logger that tools and the agent loop depend on. */
export type ToolLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Creates a pino logger with PII redaction unless the level is debug.
 */
export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  return pino({
    level,
    name: opts.name,
    hooks: {
      // Scrub arguments before they reach the serializer
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        Reflect.apply(method, this, scrubbed);
      },
    },
  });
}
