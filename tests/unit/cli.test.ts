import chalk from 'chalk';
import { ConversationHistory, createBlock, decodeHtmlEntities, renderMarkdownToTerminal } from '../../src/cli.js';

const plain = (s: string) => s;

describe('cli rendering', () => {
  const originalLevel = chalk.level;
  beforeAll(() => {
    chalk.level = 0;
  });
  afterAll(() => {
    chalk.level = originalLevel;
  });

  it('decodes HTML entities', () => {
    expect(decodeHtmlEntities('&amp;&lt;&#39;&#x41;&unknown;')).toBe("&<'A&unknown;");
  });

  it('renders markdown as plain terminal text', () => {
    expect(renderMarkdownToTerminal('**Bold** and `code`')).toBe('Bold and  code');
    expect(renderMarkdownToTerminal('# Title')).toBe('Title');
    expect(renderMarkdownToTerminal('[docs](https://example.com)')).toBe('docs (https://example.com)');
    expect(renderMarkdownToTerminal('Fish & Chips')).toBe('Fish & Chips');
  });

  it('frames a message block', () => {
    const block = createBlock('You', 'hi\n\nthere', plain, plain);
    const top = `┌─ YOU ${'─'.repeat(44)}`;
    expect(block.top).toBe(top);
    expect(block.body).toBe('│ hi\n│  \n│ there');
    expect(block.bottom).toBe(`└${'─'.repeat(top.length - 1)}`);
  });
});

describe('ConversationHistory', () => {
  it('keeps the most recent turns', () => {
    const history = new ConversationHistory();
    history.record('q1', 'a1');
    history.record('q2', 'a2');
    history.record('q3', 'a3');
    expect(history.size).toBe(6);
    expect(history.recent().map((t) => t.content)).toEqual(['a1', 'q2', 'a2', 'q3', 'a3']);
    expect(history.recent(2)).toEqual([
      { role: 'user', content: 'q3' },
      { role: 'assistant', content: 'a3' },
    ]);
    history.clear();
    expect(history.size).toBe(0);
  });
});
