import { buildSystemPrompt, getPrompt, preloadPrompts, renderPrompt } from '../../../src/core/prompts.js';
import { FIXED_NOW } from '../../helpers/scripted_model.js';

describe('prompts', () => {
  it('loads and caches the agent prompt', async () => {
    await preloadPrompts();
    const first = await getPrompt('weather_agent');
    expect(first).toContain('business_partner_lookup');
    expect(await getPrompt('weather_agent')).toBe(first);
  });

  it("injects today's date", async () => {
    const prompt = await buildSystemPrompt(FIXED_NOW);
    expect(prompt).toContain('Today is 2025-03-15.');
    expect(prompt).not.toContain('{{today}}');
  });

  it('leaves unknown placeholders alone', () => {
    expect(renderPrompt('{{a}} and {{b}}', { a: 'x' })).toBe('x and {{b}}');
  });
});
