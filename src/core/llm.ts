import { z } from 'zod';
import type { AgentConfig } from '../config/agent.js';
import { LlmRequestError } from '../tools/errors.js';
import { ExternalFetchError, fetchJSON, registerAllowedHost } from '../util/fetch.js';
import type { ToolLogger } from '../util/logging.js';

export const ToolCallRequestSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});
export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string; name: string };

export type ModelReply =
  | { kind: 'final'; text: string }
  | { kind: 'tool_requests'; calls: ToolCallRequest[]; text?: string };

export type ToolDefinition = {
  type: 'function';
  function: { name: string; description?: string; parameters: Record<string, unknown> };
};

export type CompletionRequest = {
  messages: readonly ChatMessage[];
  tools: readonly ToolDefinition[];
};

/** Anything that can take the conversation one step forward. */
export interface ChatModel {
  readonly name: string;
  complete(req: CompletionRequest): Promise<ModelReply>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tool arguments arrive as a JSON string; anything but an object reads as `{}`. */
export function parseToolArguments(raw: string | null | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
    }
  | { role: 'tool'; content: string; tool_call_id: string; name: string };

export function toWireMessages(messages: readonly ChatMessage[]): WireMessage[] {
  return messages.map((m): WireMessage => {
    switch (m.role) {
      case 'system':
      case 'user':
        return { role: m.role, content: m.content };
      case 'assistant':
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: m.content || null,
            tool_calls: m.toolCalls.map((c) => ({
              id: c.id,
              type: 'function',
              function: { name: c.name, arguments: JSON.stringify(c.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: m.content };
      case 'tool':
        return { role: 'tool', content: m.content, tool_call_id: m.toolCallId, name: m.name };
    }
  });
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().nullish() }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
});

export type LlmSettings = AgentConfig['llm'] & { baseUrl: string; apiKey: string };

export function buildGenParams(cfg: AgentConfig['llm']): { temperature: number; max_tokens?: number } {
  return {
    temperature: cfg.temperature,
    ...(cfg.maxTokens !== undefined ? { max_tokens: cfg.maxTokens } : {}),
  };
}

/**
 * Chat-completions client for any OpenAI-compatible endpoint with function calling.
 */
export class OpenAICompatibleChatModel implements ChatModel {
  readonly name: string;
  private readonly url: string;

  constructor(
    private readonly cfg: LlmSettings,
    private readonly log?: ToolLogger,
  ) {
    this.name = cfg.model;
    this.url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;
    registerAllowedHost(this.url);
  }

  async complete(req: CompletionRequest): Promise<ModelReply> {
    const body = {
      model: this.cfg.model,
      messages: toWireMessages(req.messages),
      tools: req.tools,
      tool_choice: 'auto',
      ...buildGenParams(this.cfg),
    };
    this.log?.debug({ model: this.cfg.model, messages: req.messages.length, tools: req.tools.length }, 'llm.request');

    let json: unknown;
    try {
      json = await fetchJSON(this.url, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.cfg.apiKey}` },
        body,
        timeoutMs: this.cfg.timeoutMs,
        target: 'llm',
      });
    } catch (err: unknown) {
      if (err instanceof ExternalFetchError) {
        throw new LlmRequestError(`LLM request failed: ${err.message}`, err.status);
      }
      throw err;
    }

    const parsed = CompletionSchema.safeParse(json);
    if (!parsed.success) {
      this.log?.warn({ issues: parsed.error.issues.length }, 'llm.response.invalid');
      throw new LlmRequestError('LLM returned an unexpected response');
    }

    const choice = parsed.data.choices[0];
    const message = choice.message;
    const calls = (message.tool_calls ?? []).map((c) => ({
      id: c.id,
      name: c.function.name,
      arguments: parseToolArguments(c.function.arguments),
    }));
    this.log?.debug({ finish: choice.finish_reason, toolCalls: calls.length }, 'llm.response');

    if (calls.length > 0) {
      return { kind: 'tool_requests', calls, text: message.content ?? undefined };
    }
    return { kind: 'final', text: message.content ?? '' };
  }
}
