#!/usr/bin/env node
import 'dotenv/config';
import { randomUUID } from 'crypto';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import MarkdownIt from 'markdown-it';
import { createWeatherAgent, MAX_CONTEXT_MESSAGES } from './agent/weather_agent.js';
import { loadAgentConfig } from './config/agent.js';
import { preloadPrompts } from './core/prompts.js';
import type { HistoryTurnT } from './schemas/task.js';
import { createLogger } from './util/logging.js';

const md = new MarkdownIt({
  breaks: true,
  linkify: true,
});

const FRAME_BAR = '─'.repeat(44);
const STATUS_TOP_TEXT = `┌─ STATUS ${'─'.repeat(42)}`;
const STATUS_BOTTOM_TEXT = `└${'─'.repeat(STATUS_TOP_TEXT.length - 1)}`;

type Styler = (value: string) => string;

const identity: Styler = (value: string) => value;

export interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);/gi, (_m: string, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m: string, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&[a-z]+;/gi, (entity: string) => ENTITIES[entity] ?? entity);
}

export function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  return {
    top: accent(topPlain),
    body: lines.map((line) => `${accent('│')} ${body(line)}`).join('\n'),
    bottom: accent(bottomPlain),
  };
}

export function renderMarkdownToTerminal(markdown: string): string {
  const html = md.render(markdown);

  const formatted = html
    .replace(/<h[1-6]>(.*?)<\/h[1-6]>/gi, chalk.bold.cyan('$1\n'))
    .replace(/<strong>(.*?)<\/strong>/gi, chalk.bold('$1'))
    .replace(/<em>(.*?)<\/em>/gi, chalk.italic('$1'))
    .replace(/<code>(.*?)<\/code>/gi, chalk.bgGray.white(' $1 '))
    .replace(/<a href="([^"]+)">(.*?)<\/a>/gi, (_m: string, href: string, text: string) => {
      return text === href ? chalk.blue.underline(href) : `${chalk.blue.underline(text)} ${chalk.gray(`(${href})`)}`;
    })
    .replace(/<li>(.*?)<\/li>/gi, '  • $1\n')
    .replace(/<p>(.*?)<\/p>/gis, '$1\n')
    .replace(/<br\s*\/?>\n?/gi, '\n')
    .replace(/<\/?[^>]+(>|$)/g, '')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();

  return decodeHtmlEntities(formatted);
}

/**
 * Turns exchanged in this session, resupplied to the agent as context.
 */
export class ConversationHistory {
  private turns: HistoryTurnT[] = [];

  record(question: string, answer: string): void {
    this.turns.push({ role: 'user', content: question }, { role: 'assistant', content: answer });
  }

  recent(limit = MAX_CONTEXT_MESSAGES): HistoryTurnT[] {
    return this.turns.slice(-limit);
  }

  clear(): void {
    this.turns = [];
  }

  get size(): number {
    return this.turns.length;
  }
}

class Spinner {
  private readonly frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private interval: NodeJS.Timeout | null = null;
  private currentFrame = 0;
  private status = 'Processing...';

  start() {
    this.currentFrame = 0;
    if (this.interval) clearInterval(this.interval);
    this.interval = setInterval(() => this.draw(), 80);
  }

  setStatus(status: string) {
    this.status = status;
    this.draw();
  }

  private draw() {
    if (!this.interval) return;
    const frame = chalk.yellow(this.frames[this.currentFrame]);
    process.stdout.write(`\r\x1b[2K${chalk.gray('│')} ${frame} ${chalk.gray(this.status)}`);
    this.currentFrame = (this.currentFrame + 1) % this.frames.length;
  }

  stop() {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      process.stdout.write('\r\x1b[2K');
    }
    this.status = 'Processing...';
  }
}

function printBanner(model: string) {
  console.log(chalk.yellow.bold('Trip Weather Agent: ask about your next partner visit'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(
    chalk.green('• "What\'s the weather for my visit to Acme Corp?"\n') +
      chalk.green('• "Where is TechVentures GmbH located?"\n') +
      chalk.blue('Commands: /reset (forget context), ') +
      chalk.red('exit (quit)'),
  );
  console.log(chalk.gray(`Model: ${model}`));
  console.log(chalk.gray('─'.repeat(60)));
  console.log();
}

async function main() {
  const cfg = loadAgentConfig();
  // Quieter default than the server
  const log = createLogger({ level: process.env.LOG_LEVEL ?? 'warn' });
  await preloadPrompts();
  const agent = createWeatherAgent(cfg, log);
  const rl = readline.createInterface({ input, output });
  const history = new ConversationHistory();
  const spinner = new Spinner();
  let contextId = randomUUID();

  printBanner(agent.modelName);

  while (true) {
    const q = (await rl.question(chalk.blue.bold('You> '))).trim();
    if (!q) continue;
    if (q.toLowerCase() === 'exit') break;
    if (q === '/reset') {
      history.clear();
      contextId = randomUUID();
      console.log(chalk.gray('Context cleared.'));
      continue;
    }

    const userBlock = createBlock('You', q, chalk.blueBright, chalk.white);
    console.log();
    console.log(userBlock.top);
    console.log(userBlock.body);
    console.log(userBlock.bottom);

    console.log(chalk.gray(STATUS_TOP_TEXT));
    spinner.start();
    let answer = '';
    try {
      for await (const update of agent.stream(q, contextId, history.recent())) {
        if (update.state === 'working') {
          spinner.setStatus(update.content);
        } else {
          answer = update.content;
        }
      }
    } finally {
      spinner.stop();
      console.log(chalk.gray(STATUS_BOTTOM_TEXT));
    }

    history.record(q, answer);
    const assistantBlock = createBlock('Assistant', renderMarkdownToTerminal(answer), chalk.greenBright, identity);
    console.log();
    console.log(assistantBlock.top);
    console.log(assistantBlock.body);
    console.log(assistantBlock.bottom);
    console.log();
  }
  rl.close();
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  });
}
