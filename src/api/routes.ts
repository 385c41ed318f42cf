import type { Response, Router } from 'express';
import express from 'express';
import type { TaskExecutor } from '../agent/executor.js';
import { TaskRequest, type TaskEvent } from '../schemas/task.js';
import { toStdError } from '../tools/errors.js';
import type { ToolLogger } from '../util/logging.js';
import { getPrometheusText, registry } from '../util/metrics.js';
import type { AgentCard } from './agent_card.js';

export type RouterDeps = {
  executor: TaskExecutor;
  card: AgentCard;
};

function sendError(res: Response, err: unknown, log: ToolLogger) {
  const std = toStdError(err);
  if (std.code === 'internal_error') {
    log.error({ err }, 'api.internal_error');
    return res.status(500).json({ error: 'internal_error' });
  }
  log.warn({ code: std.code, reason: std.message }, 'api.request_failed');
  return res.status(std.status).json({ error: { code: std.code, message: std.message } });
}

function sseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export const router = (log: ToolLogger, deps: RouterDeps): Router => {
  const r = express.Router();

  r.get('/.well-known/agent.json', (_req, res) => {
    res.json(deps.card);
  });

  r.post('/tasks', async (req, res) => {
    const parsed = TaskRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const events: TaskEvent[] = [];
      const task = await deps.executor.execute(parsed.data, (event) => {
        events.push(event);
      });
      return res.json({ task, events });
    } catch (err: unknown) {
      return sendError(res, err, log);
    }
  });

  r.post('/tasks/stream', async (req, res) => {
    const parsed = TaskRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();
    try {
      await deps.executor.execute(parsed.data, (event) => {
        res.write(sseFrame(event.kind, event));
      });
    } catch (err: unknown) {
      const std = toStdError(err);
      if (std.code === 'internal_error') log.error({ err }, 'api.stream_failed');
      res.write(sseFrame('error', { error: { code: std.code, message: std.message } }));
    }
    return res.end();
  });

  r.get('/tasks/:id', async (req, res) => {
    try {
      const task = await deps.executor.getTask(req.params.id);
      return res.json({ task });
    } catch (err: unknown) {
      return sendError(res, err, log);
    }
  });

  r.post('/tasks/:id/cancel', async (req, res) => {
    try {
      await deps.executor.cancel(req.params.id);
      return res.status(204).end();
    } catch (err: unknown) {
      return sendError(res, err, log);
    }
  });

  r.get('/metrics', async (_req, res) => {
    try {
      const text = await getPrometheusText();
      res.setHeader('Content-Type', registry.contentType);
      return res.send(text);
    } catch (err: unknown) {
      return sendError(res, err, log);
    }
  });

  return r;
};
