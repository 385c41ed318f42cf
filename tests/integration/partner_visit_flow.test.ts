import request from 'supertest';
import { createWeatherAgent } from '../../src/agent/weather_agent.js';
import { loadAgentConfig } from '../../src/config/agent.js';
import { mockTemperatureC } from '../../src/tools/weather/mock.js';
import { celsiusToFahrenheit } from '../../src/tools/weather/providers.js';
import { makeTestApp } from '../helpers/http.js';
import { silentLog } from '../helpers/scripted_model.js';

// Offline stack end to end: seed directory, mock weather, heuristic model.
describe('partner visit flow (offline)', () => {
  const agent = createWeatherAgent(loadAgentConfig({}), silentLog);

  it('looks up the partner and forecasts at their location', async () => {
    const c = mockTemperatureC('New York');
    await expect(agent.invoke("What's the weather for my visit to Acme Corp?", 'ctx-1')).resolves.toEqual({
      status: 'completed',
      message: `The weather in New York, USA for your visit to Acme Corp today will be partly cloudy with temperatures around ${c}°C (${celsiusToFahrenheit(c)}°F).`,
    });
  });

  it('forecasts for today when the visit is "next week"', async () => {
    const c = mockTemperatureC('New York');
    await expect(
      agent.invoke("What's the weather for my visit to Acme Corp next week?", 'ctx-2'),
    ).resolves.toEqual({
      status: 'completed',
      message: `The weather in New York, USA for your visit to Acme Corp today will be partly cloudy with temperatures around ${c}°C (${celsiusToFahrenheit(c)}°F).`,
    });
  });

  it('answers a location question from the directory', async () => {
    await expect(agent.invoke('Where is TechVentures GmbH located?', 'ctx-1')).resolves.toEqual({
      status: 'completed',
      message: 'Found business partner: TechVentures GmbH (ID: BP002). Location: Berlin, Germany',
    });
  });

  it('suggests close matches for an unknown partner', async () => {
    await expect(agent.invoke('Where is Global Tech Partners?', 'ctx-1')).resolves.toEqual({
      status: 'completed',
      message:
        "Business partner 'Global Tech Partners' not found. Did you mean one of these? TechVentures GmbH, Global Innovations Ltd, Alpine Technologies SA",
    });
  });

  it('reports an unknown partner', async () => {
    const result = await agent.invoke('weather for my visit to Atlantis', 'ctx-1');
    expect(result.message).toBe(
      "Business partner 'Atlantis' not found. Please check the spelling or try a different name.",
    );
  });

  it('serves the same flow over HTTP', async () => {
    const c = mockTemperatureC('Berlin');
    const res = await request(makeTestApp()).post('/tasks').send({ query: "What's the weather in Berlin, Germany?" });
    expect(res.status).toBe(200);
    expect(res.body.task.artifacts[0].text).toBe(
      `The weather in Berlin, Germany today will be partly cloudy with temperatures around ${c}°C (${celsiusToFahrenheit(c)}°F).`,
    );
  });
});
