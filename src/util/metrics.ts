import { Counter, Histogram, Registry } from 'prom-client';

/**
 * Prometheus metrics for outbound calls and agent turns, exposed at /metrics.
 * A dedicated registry keeps the output free of process defaults.
 */
export const registry = new Registry();

export type ExternalStatus = 'ok' | '4xx' | '5xx' | 'timeout' | 'network';
export type ToolOutcome = 'ok' | 'invalid_args' | 'unknown_tool' | 'error';
export type TurnOutcome = 'completed' | 'error';

const externalRequests = new Counter({
  name: 'external_requests_total',
  help: 'Outbound HTTP requests by target and status',
  labelNames: ['target', 'status'] as const,
  registers: [registry],
});

const externalLatency = new Histogram({
  name: 'external_request_duration_ms',
  help: 'Outbound HTTP latency in milliseconds',
  labelNames: ['target', 'status'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

const toolCalls = new Counter({
  name: 'agent_tool_calls_total',
  help: 'Tool invocations requested by the model',
  labelNames: ['tool', 'outcome'] as const,
  registers: [registry],
});

const turns = new Counter({
  name: 'agent_turns_total',
  help: 'Completed agent turns by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

const toolRounds = new Histogram({
  name: 'agent_tool_rounds',
  help: 'Tool rounds used per turn',
  buckets: [0, 1, 2, 3, 4, 5, 8],
  registers: [registry],
});

export function observeExternal(labels: { target: string; status: ExternalStatus }, ms: number): void {
  externalRequests.inc(labels);
  externalLatency.observe(labels, ms);
}

export function incToolCall(tool: string, outcome: ToolOutcome): void {
  toolCalls.inc({ tool, outcome });
}

export function observeTurn(outcome: TurnOutcome, rounds: number): void {
  turns.inc({ outcome });
  toolRounds.observe(rounds);
}

export async function getPrometheusText(): Promise<string> {
  return registry.metrics();
}
