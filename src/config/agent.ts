import { z } from 'zod';

// Empty strings in .env files count as unset.
const blank = (v: unknown): unknown => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalString = z.preprocess(blank, z.string().optional());
const optionalUrl = z.preprocess(blank, z.string().url().optional());
const intWithDefault = (def: number, min: number) =>
  z.preprocess(blank, z.coerce.number().int().min(min).default(def));

const AgentConfigSchema = z
  .object({
    host: z.preprocess(blank, z.string().default('0.0.0.0')),
    port: z.preprocess(blank, z.coerce.number().int().min(1).max(65535).default(5000)),
    publicUrl: optionalUrl,
    logLevel: z.preprocess(
      blank,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
    maxToolRounds: intWithDefault(5, 1),
    llm: z.object({
      baseUrl: optionalUrl,
      apiKey: optionalString,
      model: z.preprocess(blank, z.string().default('gpt-4o-mini')),
      timeoutMs: intWithDefault(15000, 1000),
      temperature: z.preprocess(blank, z.coerce.number().min(0).max(2).default(0.2)),
      maxTokens: z.preprocess(blank, z.coerce.number().int().positive().optional()),
    }),
    weather: z.object({
      apiKey: optionalString,
      baseUrl: z.preprocess(blank, z.string().url().default('https://api.openweathermap.org')),
      timeoutMs: intWithDefault(5000, 100),
    }),
    partners: z.object({
      source: z.preprocess(blank, z.enum(['static', 'remote']).default('static')),
      baseUrl: optionalUrl,
      timeoutMs: intWithDefault(5000, 100),
      limit: intWithDefault(10, 1),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.partners.source === 'remote' && !cfg.partners.baseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['partners', 'baseUrl'],
        message: 'PARTNER_DIRECTORY_URL is required when PARTNER_SOURCE=remote',
      });
    }
  });

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  return AgentConfigSchema.parse({
    host: env.HOST,
    port: env.PORT,
    publicUrl: env.AGENT_PUBLIC_URL,
    logLevel: env.LOG_LEVEL,
    maxToolRounds: env.AGENT_MAX_TOOL_ROUNDS,
    llm: {
      baseUrl: env.LLM_PROVIDER_BASEURL,
      apiKey: env.LLM_API_KEY,
      model: env.LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      temperature: env.LLM_TOOLS_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    weather: {
      apiKey: env.OPENWEATHERMAP_API_KEY,
      baseUrl: env.OPENWEATHERMAP_BASE_URL,
      timeoutMs: env.WEATHER_TIMEOUT_MS,
    },
    partners: {
      source: env.PARTNER_SOURCE,
      baseUrl: env.PARTNER_DIRECTORY_URL,
      timeoutMs: env.PARTNER_TIMEOUT_MS,
      limit: env.PARTNER_SEARCH_LIMIT,
    },
  });
}

export function resolvePublicUrl(cfg: AgentConfig): string {
  return cfg.publicUrl ?? `http://${cfg.host}:${cfg.port}/`;
}
