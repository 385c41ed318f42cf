import type { AgentConfig } from '../config/agent.js';
import { resolvePublicUrl } from '../config/agent.js';

export type AgentSkill = {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples: string[];
};

export type AgentCard = {
  name: string;
  description: string;
  url: string;
  version: string;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  capabilities: { streaming: boolean; pushNotifications: boolean };
  skills: AgentSkill[];
};

export const SUPPORTED_CONTENT_TYPES = ['text', 'text/plain'];

export function buildAgentCard(cfg: AgentConfig, version = '0.1.0'): AgentCard {
  return {
    name: 'Trip Weather Agent',
    description: 'Looks up business partners and tells you what weather to expect when you visit them.',
    url: resolvePublicUrl(cfg),
    version,
    defaultInputModes: SUPPORTED_CONTENT_TYPES,
    defaultOutputModes: SUPPORTED_CONTENT_TYPES,
    capabilities: { streaming: true, pushNotifications: false },
    skills: [
      {
        id: 'partner_weather',
        name: 'Partner visit weather',
        description: 'Finds where a business partner is located and forecasts the weather there for the next 7 days.',
        tags: ['weather', 'travel', 'business partners'],
        examples: [
          "What's the weather for my visit to Acme Corp next week?",
          'Where is TechVentures GmbH located?',
          "What's the weather in Berlin on March 15?",
          'Show me the weather at Acme Corp today',
        ],
      },
    ],
  };
}
