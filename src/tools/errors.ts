import { ExternalFetchError } from '../util/fetch.js';

/** The weather provider could not produce a forecast; `reason` is shown to the user. */
export class WeatherUnavailableError extends Error {
  readonly reason: string;
  constructor(reason: string) {
    super(reason);
    this.name = 'WeatherUnavailableError';
    this.reason = reason;
  }
}

export class LlmRequestError extends Error {
  readonly status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = 'LlmRequestError';
    this.status = status;
  }
}

export class ToolLoopLimitError extends Error {
  readonly limit: number;
  constructor(limit: number) {
    super(`Tool-call limit of ${limit} rounds exceeded`);
    this.name = 'ToolLoopLimitError';
    this.limit = limit;
  }
}

export class UnsupportedOperationError extends Error {
  readonly operation: string;
  constructor(operation: string) {
    super(`Operation not supported: ${operation}`);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

export class TaskNotFoundError extends Error {
  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class InvalidTaskStateError extends Error {
  constructor(taskId: string, state: string) {
    super(`Task ${taskId} is already ${state}`);
    this.name = 'InvalidTaskStateError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps outbound HTTP failures to the reasons surfaced by the weather tool.
 */
export function toWeatherUnavailable(err: unknown): WeatherUnavailableError {
  if (err instanceof WeatherUnavailableError) return err;
  if (err instanceof ExternalFetchError) {
    if (err.kind === 'timeout') return new WeatherUnavailableError('timed out');
    if (err.kind === 'http') {
      if (err.status === 429) return new WeatherUnavailableError('rate limited');
      return new WeatherUnavailableError(`provider error: ${err.status ?? 'unknown'}`);
    }
    return new WeatherUnavailableError(`provider error: ${err.message}`);
  }
  return new WeatherUnavailableError(`provider error: ${errorMessage(err)}`);
}

export interface StandardError {
  code: string;
  message: string;
  status: number;
}

/**
 * Maps errors reaching the HTTP layer to a status and a stable error code.
 */
export function toStdError(error: unknown): StandardError {
  if (error instanceof UnsupportedOperationError) {
    return { code: 'unsupported_operation', message: error.message, status: 501 };
  }
  if (error instanceof TaskNotFoundError) {
    return { code: 'task_not_found', message: error.message, status: 404 };
  }
  if (error instanceof InvalidTaskStateError) {
    return { code: 'invalid_task_state', message: error.message, status: 409 };
  }
  return { code: 'internal_error', message: 'Internal error', status: 500 };
}
