import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';
import { toIsoDate } from '../util/dates.js';

type PromptName = 'weather_agent';

const FILES: Record<PromptName, string> = {
  weather_agent: 'weather_agent.md',
};
const NAMES: PromptName[] = ['weather_agent'];

const PROMPTS: Partial<Record<PromptName, string>> = {};

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  // dist/src/core -> src/prompts
  candidates.push(path.join(__dirname, '..', '..', '..', 'src', 'prompts'));
  const found = candidates.find((c) => fs.existsSync(c));
  if (!found) throw new Error(`Prompt directory not found (tried ${candidates.join(', ')})`);
  return found;
}

export async function getPrompt(name: PromptName): Promise<string> {
  const cached = PROMPTS[name];
  if (cached !== undefined) return cached;
  const text = await readFile(path.join(promptsDir(), FILES[name]), 'utf-8');
  PROMPTS[name] = text;
  return text;
}

export async function preloadPrompts(): Promise<void> {
  await Promise.all(NAMES.map((name) => getPrompt(name)));
}

/** Replaces `{{key}}` placeholders; unknown keys are left as-is. */
export function renderPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (whole, key: string) => vars[key] ?? whole);
}

export async function buildSystemPrompt(now: Date = new Date()): Promise<string> {
  const template = await getPrompt('weather_agent');
  return renderPrompt(template, { today: toIsoDate(now) }).trim();
}
