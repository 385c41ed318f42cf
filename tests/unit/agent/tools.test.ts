import { describeToolCall, executeToolCall, type ToolSpec } from '../../../src/agent/tools/index.js';
import { mockTemperatureC } from '../../../src/tools/weather/mock.js';
import { celsiusToFahrenheit } from '../../../src/tools/weather/providers.js';
import { offlineTools } from '../../helpers/agent.js';
import { silentLog } from '../../helpers/scripted_model.js';

const tools = offlineTools();

function run(name: string, args: Record<string, unknown>) {
  return executeToolCall(tools, { id: 'call_1', name, arguments: args }, silentLog);
}

describe('agent tools', () => {
  it('exposes both tools to the model', () => {
    expect(tools.map((t) => t.spec.function.name)).toEqual(['business_partner_lookup', 'weather_forecast']);
    expect(tools[1].spec.function.parameters).toMatchObject({ required: ['location'] });
  });

  it('looks up partners', async () => {
    await expect(run('business_partner_lookup', { partner_name: 'nordic' })).resolves.toBe(
      'Found business partner: Nordic Systems AB (ID: BP005). Location: Stockholm, Sweden',
    );
  });

  it('forecasts with a null date as today', async () => {
    const c = mockTemperatureC('Stockholm');
    await expect(
      run('weather_forecast', { location: 'Stockholm, Sweden', date: null, partner_name: 'Nordic Systems AB' }),
    ).resolves.toBe(
      `The weather in Stockholm, Sweden for your visit to Nordic Systems AB today will be partly cloudy with temperatures around ${c}°C (${celsiusToFahrenheit(c)}°F).`,
    );
  });

  it('reports invalid arguments', async () => {
    await expect(run('weather_forecast', {})).resolves.toBe('Invalid arguments for weather_forecast: location: Required');
    await expect(run('business_partner_lookup', { partner_name: 42 })).resolves.toBe(
      'Invalid arguments for business_partner_lookup: partner_name: Expected string, received number',
    );
  });

  it('treats an empty partner name as not found', async () => {
    await expect(run('business_partner_lookup', { partner_name: '' })).resolves.toBe(
      "Business partner '' not found. Please check the spelling or try a different name.",
    );
  });

  it('reports unknown tools', async () => {
    await expect(run('flight_search', {})).resolves.toBe("Unknown tool 'flight_search'.");
  });

  it('turns thrown errors into text', async () => {
    const broken: ToolSpec = {
      name: 'broken',
      description: 'always fails',
      spec: { type: 'function', function: { name: 'broken', parameters: {} } },
      call: async () => {
        throw new Error('kaput');
      },
    };
    await expect(executeToolCall([broken], { id: 'c', name: 'broken', arguments: {} }, silentLog)).resolves.toBe(
      'Tool broken failed: kaput',
    );
  });
});

describe('describeToolCall', () => {
  it('describes each call', () => {
    expect(describeToolCall({ id: '1', name: 'business_partner_lookup', arguments: { partner_name: 'Acme' } })).toBe(
      "Looking up business partner 'Acme'...",
    );
    expect(describeToolCall({ id: '2', name: 'weather_forecast', arguments: { location: 'Berlin, Germany' } })).toBe(
      'Fetching weather forecast for Berlin, Germany...',
    );
    expect(describeToolCall({ id: '3', name: 'weather_forecast', arguments: {} })).toBe('Running weather_forecast...');
  });
});
