import 'dotenv/config';
import express from 'express';
import { InMemoryTaskStore, TaskExecutor } from '../agent/executor.js';
import { createWeatherAgent, type WeatherAgent } from '../agent/weather_agent.js';
import { loadAgentConfig, resolvePublicUrl, type AgentConfig } from '../config/agent.js';
import { preloadPrompts } from '../core/prompts.js';
import { createLogger, type ToolLogger } from '../util/logging.js';
import { buildAgentCard } from './agent_card.js';
import { router } from './routes.js';

export type AppDeps = {
  cfg: AgentConfig;
  log: ToolLogger;
  agent?: Pick<WeatherAgent, 'stream'>;
};

function resOnFinish(res: express.Response, cb: () => void) {
  res.once('finish', cb);
}

export function createApp(deps: AppDeps): express.Express {
  const { cfg, log } = deps;
  const agent = deps.agent ?? createWeatherAgent(cfg, log);
  const executor = new TaskExecutor(agent, new InMemoryTaskStore(), log);
  const app = express();

  app.use(express.json({ limit: '512kb' }));

  // CORS support for browser clients
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true });
  });
  app.use('/', router(log, { executor, card: buildAgentCard(cfg) }));

  return app;
}

async function start(): Promise<void> {
  const cfg = loadAgentConfig();
  const log = createLogger({ level: cfg.logLevel });
  await preloadPrompts();
  const app = createApp({ cfg, log });
  app.listen(cfg.port, cfg.host, () => {
    log.info({ host: cfg.host, port: cfg.port, url: resolvePublicUrl(cfg) }, 'HTTP server started');
  });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    createLogger().fatal({ err }, 'server.start_failed');
    process.exitCode = 1;
  });
}
