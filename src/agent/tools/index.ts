import { z } from 'zod';
import type { ToolCallRequest, ToolDefinition } from '../../core/llm.js';
import { errorMessage } from '../../tools/errors.js';
import { describePartnerMatch, type PartnerDirectory } from '../../tools/partners.js';
import { getWeatherForecast } from '../../tools/weather.js';
import type { WeatherProvider } from '../../tools/weather/providers.js';
import type { ToolLogger } from '../../util/logging.js';
import { incToolCall, type ToolOutcome } from '../../util/metrics.js';

export type ToolResult = { outcome: ToolOutcome; content: string };

export type ToolSpec = {
  name: string;
  description: string;
  // OpenAI-style tool spec handed to the model
  spec: ToolDefinition;
  call: (args: unknown) => Promise<ToolResult>;
};

// Minimal JSON Schema builders for tool parameters
const str = (description: string) => ({ type: 'string', description });
const obj = (properties: Record<string, unknown>, required: string[] = []) => ({
  type: 'object',
  properties,
  required,
  additionalProperties: false,
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
}

function defineTool<T>(def: {
  name: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  parameters: Record<string, unknown>;
  run: (input: T) => Promise<string>;
}): ToolSpec {
  return {
    name: def.name,
    description: def.description,
    spec: { type: 'function', function: { name: def.name, description: def.description, parameters: def.parameters } },
    async call(args: unknown): Promise<ToolResult> {
      const parsed = def.schema.safeParse(args);
      if (!parsed.success) {
        return { outcome: 'invalid_args', content: `Invalid arguments for ${def.name}: ${formatIssues(parsed.error)}` };
      }
      return { outcome: 'ok', content: await def.run(parsed.data) };
    },
  };
}

export const PartnerLookupArgs = z.object({
  partner_name: z.string(),
});

export const WeatherForecastArgs = z.object({
  location: z.string().min(1),
  date: z.string().nullish(),
  partner_name: z.string().nullish(),
});

export type AgentToolDeps = {
  partners: PartnerDirectory;
  weather: WeatherProvider;
  log: ToolLogger;
  now?: () => Date;
};

export function createAgentTools(deps: AgentToolDeps): ToolSpec[] {
  const now = deps.now ?? (() => new Date());
  return [
    defineTool({
      name: 'business_partner_lookup',
      description:
        'Look up a business partner by name and return their location (city and country). Accepts partial names.',
      schema: PartnerLookupArgs,
      parameters: obj({ partner_name: str('Name or partial name of the business partner') }, ['partner_name']),
      async run(input) {
        const match = await deps.partners.search(input.partner_name);
        deps.log.debug({ found: match.found, source: deps.partners.kind }, 'tool.partner_lookup');
        return describePartnerMatch(input.partner_name, match);
      },
    }),
    defineTool({
      name: 'weather_forecast',
      description:
        "Get the weather forecast for a location given as 'City, Country', optionally for a date (YYYY-MM-DD) within the next 7 days.",
      schema: WeatherForecastArgs,
      parameters: obj(
        {
          location: str("Location as 'City, Country', e.g. 'Berlin, Germany'"),
          date: str('Date in YYYY-MM-DD format, today or within the next 7 days'),
          partner_name: str('Business partner being visited, used to personalize the answer'),
        },
        ['location'],
      ),
      async run(input) {
        return getWeatherForecast(
          deps.weather,
          { location: input.location, date: input.date ?? undefined, partnerName: input.partner_name ?? undefined },
          { log: deps.log, now: now() },
        );
      },
    }),
  ];
}

/**
 * Runs one model-requested call. Unknown tools, bad arguments and tool
 * failures all come back as text so the loop can continue.
 */
export async function executeToolCall(tools: readonly ToolSpec[], call: ToolCallRequest, log: ToolLogger): Promise<string> {
  const tool = tools.find((t) => t.name === call.name);
  if (!tool) {
    log.warn({ tool: call.name }, 'tool.unknown');
    incToolCall(call.name, 'unknown_tool');
    return `Unknown tool '${call.name}'.`;
  }
  const start = Date.now();
  try {
    const result = await tool.call(call.arguments);
    incToolCall(tool.name, result.outcome);
    log.debug({ tool: tool.name, outcome: result.outcome, ms: Date.now() - start }, 'tool.done');
    return result.content;
  } catch (err: unknown) {
    incToolCall(tool.name, 'error');
    log.error({ tool: tool.name, err }, 'tool.failed');
    return `Tool ${tool.name} failed: ${errorMessage(err)}`;
  }
}

/** Progress line shown to the user while a call runs. */
export function describeToolCall(call: ToolCallRequest): string {
  const partner = call.arguments['partner_name'];
  const location = call.arguments['location'];
  if (call.name === 'business_partner_lookup' && typeof partner === 'string') {
    return `Looking up business partner '${partner}'...`;
  }
  if (call.name === 'weather_forecast' && typeof location === 'string') {
    return `Fetching weather forecast for ${location}...`;
  }
  return `Running ${call.name}...`;
}
