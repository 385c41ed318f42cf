import type { ChatMessage } from '../../../src/core/llm.js';
import {
  extractDate,
  extractLocation,
  extractPartnerName,
  HeuristicChatModel,
  OFFLINE_GUIDANCE,
} from '../../../src/core/offline_model.js';
import { FIXED_NOW } from '../../helpers/scripted_model.js';

const model = new HeuristicChatModel(() => FIXED_NOW);

function ask(messages: ChatMessage[]) {
  return model.complete({ messages, tools: [] });
}

describe('extractors', () => {
  it('finds partner names after common phrasings', () => {
    expect(extractPartnerName("What's the weather for my visit to Acme Corp?")).toBe('Acme Corp');
    expect(extractPartnerName('Where is TechVentures GmbH located?')).toBe('TechVentures GmbH');
    expect(extractPartnerName('hello there')).toBeUndefined();
  });

  it('finds City, Country locations', () => {
    expect(extractLocation("What's the weather in Berlin, Germany?")).toBe('Berlin, Germany');
    expect(extractLocation('Weather in San Francisco, USA tomorrow')).toBe('San Francisco, USA');
    expect(extractLocation('weather in Berlin')).toBeUndefined();
  });

  it('reads ISO dates and tomorrow', () => {
    expect(extractDate('on 2025-03-18 please', FIXED_NOW)).toBe('2025-03-18');
    expect(extractDate('and tomorrow?', FIXED_NOW)).toBe('2025-03-16');
    expect(extractDate('next week', FIXED_NOW)).toBeUndefined();
  });
});

describe('HeuristicChatModel', () => {
  it('asks for a forecast when a location is named', async () => {
    await expect(ask([{ role: 'user', content: "What's the weather in Berlin, Germany tomorrow?" }])).resolves.toEqual({
      kind: 'tool_requests',
      calls: [{ id: 'call_1', name: 'weather_forecast', arguments: { location: 'Berlin, Germany', date: '2025-03-16' } }],
    });
  });

  it('looks up a partner first', async () => {
    await expect(ask([{ role: 'user', content: "What's the weather for my visit to Acme Corp?" }])).resolves.toEqual({
      kind: 'tool_requests',
      calls: [{ id: 'call_1', name: 'business_partner_lookup', arguments: { partner_name: 'Acme Corp' } }],
    });
  });

  it('follows a found partner with a forecast', async () => {
    const reply = await ask([
      { role: 'user', content: "What's the weather for my visit to Acme Corp?" },
      { role: 'assistant', content: '' },
      {
        role: 'tool',
        name: 'business_partner_lookup',
        toolCallId: 'call_1',
        content: 'Found business partner: Acme Corp (ID: BP001). Location: New York, USA',
      },
    ]);
    expect(reply).toEqual({
      kind: 'tool_requests',
      calls: [
        { id: 'call_2', name: 'weather_forecast', arguments: { location: 'New York, USA', partner_name: 'Acme Corp' } },
      ],
    });
  });

  it('answers with the partner result when no weather was asked', async () => {
    const content = 'Found business partner: TechVentures GmbH (ID: BP002). Location: Berlin, Germany';
    const reply = await ask([
      { role: 'user', content: 'Where is TechVentures GmbH located?' },
      { role: 'tool', name: 'business_partner_lookup', toolCallId: 'call_1', content },
    ]);
    expect(reply).toEqual({ kind: 'final', text: content });
  });

  it('ignores tool results from earlier turns', async () => {
    const reply = await ask([
      { role: 'user', content: 'Where is TechVentures GmbH located?' },
      { role: 'tool', name: 'business_partner_lookup', toolCallId: 'call_1', content: 'Found ...' },
      { role: 'assistant', content: 'Berlin' },
      { role: 'user', content: 'thanks' },
    ]);
    expect(reply).toEqual({ kind: 'final', text: OFFLINE_GUIDANCE });
  });
});
