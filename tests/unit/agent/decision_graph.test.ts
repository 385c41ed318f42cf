import { buildDecisionGraph, recursionLimitFor } from '../../../src/agent/graphs/decision.graph.js';
import { offlineTools } from '../../helpers/agent.js';
import { finalReply, ScriptedChatModel, silentLog, toolCall } from '../../helpers/scripted_model.js';

const ACME_FOUND = 'Found business partner: Acme Corp (ID: BP001). Location: New York, USA';

function graphFor(model: ScriptedChatModel, maxToolRounds = 5) {
  return buildDecisionGraph({ model, tools: offlineTools(), maxToolRounds, log: silentLog });
}

describe('decision graph', () => {
  it('alternates model and tools until a final answer', async () => {
    const model = new ScriptedChatModel([
      toolCall('c1', 'business_partner_lookup', { partner_name: 'Acme Corp' }),
      toolCall('c2', 'weather_forecast', { location: 'New York, USA', partner_name: 'Acme Corp' }),
      finalReply('Pack a light jacket.'),
    ]);

    const result = await graphFor(model).invoke(
      { messages: [{ role: 'user', content: 'Weather for my Acme Corp visit?' }] },
      { recursionLimit: recursionLimitFor(5) },
    );

    expect(result.answer).toBe('Pack a light jacket.');
    expect(result.toolRounds).toBe(2);
    expect(result.messages.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'assistant']);
    expect(result.messages[2]).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      name: 'business_partner_lookup',
      content: ACME_FOUND,
    });
    expect(model.seen).toHaveLength(3);
    expect(model.seen[1][2]).toMatchObject({ role: 'tool', content: ACME_FOUND });
  });

  it('runs every call of one round in order', async () => {
    const model = new ScriptedChatModel([
      {
        kind: 'tool_requests',
        calls: [
          { id: 'a', name: 'business_partner_lookup', arguments: { partner_name: 'Acme Corp' } },
          { id: 'b', name: 'business_partner_lookup', arguments: { partner_name: 'Sunset Digital' } },
        ],
      },
      finalReply('Both found.'),
    ]);

    const result = await graphFor(model).invoke({ messages: [{ role: 'user', content: 'Where are they?' }] });

    expect(result.toolRounds).toBe(1);
    const toolMessages = result.messages.filter((m) => m.role === 'tool');
    expect(toolMessages.map((m) => m.content)).toEqual([
      ACME_FOUND,
      'Found business partner: Sunset Digital (ID: BP010). Location: San Francisco, USA',
    ]);
  });

  it('feeds unknown tool errors back to the model', async () => {
    const model = new ScriptedChatModel([toolCall('c1', 'flight_search', {}), finalReply('I cannot search flights.')]);

    const result = await graphFor(model).invoke({ messages: [{ role: 'user', content: 'Flights?' }] });

    expect(result.answer).toBe('I cannot search flights.');
    expect(model.seen[1][2]).toMatchObject({ role: 'tool', content: "Unknown tool 'flight_search'." });
  });

  it('stops when the model keeps asking for tools', async () => {
    const model = new ScriptedChatModel([
      toolCall('c1', 'business_partner_lookup', { partner_name: 'Acme Corp' }),
      toolCall('c2', 'business_partner_lookup', { partner_name: 'Acme Corp' }),
    ]);

    await expect(
      graphFor(model, 1).invoke(
        { messages: [{ role: 'user', content: 'loop' }] },
        { recursionLimit: recursionLimitFor(1) },
      ),
    ).rejects.toThrow('Tool-call limit of 1 rounds exceeded');
    expect(model.seen).toHaveLength(2);
  });
});
