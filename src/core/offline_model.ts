import { addDays, toIsoDate } from '../util/dates.js';
import type { ChatMessage, ChatModel, CompletionRequest, ModelReply, ToolCallRequest } from './llm.js';

const PARTNER_AFTER = /\b(?:visit to|visiting|meeting with|trip to|at|is|about)\s+([A-Z][\w&.-]*(?:\s+[A-Z][\w&.-]*)*)/;
const LOCATION_IN = /\bin\s+([A-Z][A-Za-z.' -]*?)\s*,\s*([A-Z][A-Za-z'-]*(?:\s+[A-Z][A-Za-z'-]*)*)/;
const ISO_DATE = /\b(\d{4}-\d{2}-\d{2})\b/;
const WEATHER_WORDS = /\b(weather|forecast|temperature|rain|raining|snow|cold|hot|warm|umbrella|pack|wear)\b/i;
const FOUND_PARTNER = /^Found business partner: (.+) \(ID: [^)]+\)\. Location: (.+)$/;

export const OFFLINE_GUIDANCE =
  "I can look up business partners and their local weather. Try \"What's the weather for my visit to Acme Corp?\" " +
  'or "What\'s the weather in Berlin, Germany?"';

export function extractPartnerName(text: string): string | undefined {
  return PARTNER_AFTER.exec(text)?.[1];
}

export function extractLocation(text: string): string | undefined {
  const m = LOCATION_IN.exec(text);
  return m ? `${m[1]}, ${m[2]}` : undefined;
}

export function extractDate(text: string, now: Date): string | undefined {
  const iso = ISO_DATE.exec(text);
  if (iso) return iso[1];
  if (/\btomorrow\b/i.test(text)) return toIsoDate(addDays(now, 1));
  return undefined;
}

/** Messages belonging to the current turn: the last user message and what follows it. */
function currentTurn(messages: readonly ChatMessage[]): { question: string; toolResults: ChatMessage[] } {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m.role === 'user') {
      return { question: m.content, toolResults: messages.slice(i + 1).filter((x) => x.role === 'tool') };
    }
  }
  return { question: '', toolResults: [] };
}

/**
 * Rule-based stand-in for a hosted model, used when no LLM credentials are
 * configured. It drives the same two tools through the same loop.
 */
export class HeuristicChatModel implements ChatModel {
  readonly name = 'heuristic';

  constructor(private readonly now: () => Date = () => new Date()) {}

  async complete(req: CompletionRequest): Promise<ModelReply> {
    const { question, toolResults } = currentTurn(req.messages);
    const last = toolResults[toolResults.length - 1];
    const callId = `call_${toolResults.length + 1}`;
    const date = extractDate(question, this.now());

    if (!last) {
      const location = extractLocation(question);
      if (location) {
        return this.request(callId, 'weather_forecast', { location, ...(date ? { date } : {}) });
      }
      const partner = extractPartnerName(question);
      if (partner) {
        return this.request(callId, 'business_partner_lookup', { partner_name: partner });
      }
      return { kind: 'final', text: OFFLINE_GUIDANCE };
    }

    if (last.role === 'tool' && last.name === 'business_partner_lookup') {
      const found = FOUND_PARTNER.exec(last.content);
      if (found && WEATHER_WORDS.test(question)) {
        return this.request(callId, 'weather_forecast', {
          location: found[2],
          partner_name: found[1],
          ...(date ? { date } : {}),
        });
      }
    }
    return { kind: 'final', text: last.content };
  }

  private request(id: string, name: string, args: ToolCallRequest['arguments']): ModelReply {
    return { kind: 'tool_requests', calls: [{ id, name, arguments: args }] };
  }
}
