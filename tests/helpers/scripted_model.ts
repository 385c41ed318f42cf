import type { ChatMessage, ChatModel, CompletionRequest, ModelReply, ToolCallRequest } from '../../src/core/llm.js';
import { createLogger } from '../../src/util/logging.js';

export const silentLog = createLogger({ level: 'silent' });

/**
 * Replays canned replies in order and records every conversation it was shown.
 */
export class ScriptedChatModel implements ChatModel {
  readonly name = 'scripted';
  readonly seen: ChatMessage[][] = [];

  constructor(private readonly replies: Array<ModelReply | Error>) {}

  async complete(req: CompletionRequest): Promise<ModelReply> {
    this.seen.push([...req.messages]);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function toolCall(id: string, name: string, args: ToolCallRequest['arguments']): ModelReply {
  return { kind: 'tool_requests', calls: [{ id, name, arguments: args }] };
}

export function finalReply(text: string): ModelReply {
  return { kind: 'final', text };
}

/** Fixed instant: Saturday 2025-03-15, 09:00 UTC. */
export const FIXED_NOW = new Date('2025-03-15T09:00:00Z');
