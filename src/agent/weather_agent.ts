import { z } from 'zod';
import type { AgentConfig } from '../config/agent.js';
import { OpenAICompatibleChatModel, ToolCallRequestSchema, type ChatMessage, type ChatModel, type ToolCallRequest } from '../core/llm.js';
import { HeuristicChatModel } from '../core/offline_model.js';
import { buildSystemPrompt } from '../core/prompts.js';
import type { HistoryTurnT } from '../schemas/task.js';
import { errorMessage } from '../tools/errors.js';
import { createPartnerDirectory } from '../tools/partners.js';
import { createWeatherProvider } from '../tools/weather.js';
import type { ToolLogger } from '../util/logging.js';
import { observeTurn } from '../util/metrics.js';
import { buildDecisionGraph, recursionLimitFor, type DecisionGraph } from './graphs/decision.graph.js';
import { createAgentTools, describeToolCall, type ToolSpec } from './tools/index.js';

export const MAX_CONTEXT_MESSAGES = 5;
export const PROCESSING_NOTICE = 'Processing your request...';
export const EMPTY_ANSWER_FALLBACK = "I processed your request but couldn't generate a response. Please try again.";

export type AgentState = 'working' | 'input_required' | 'completed';
export type AgentUpdate = { state: AgentState; content: string };
export type AgentResult = { status: 'completed' | 'input_required' | 'error'; message: string };

// Shape of the graph state as seen by the "values" stream
const Snapshot = z.object({
  pending: z.array(ToolCallRequestSchema).default([]),
  toolRounds: z.number().default(0),
  answer: z.string().optional(),
});

export type WeatherAgentDeps = {
  model: ChatModel;
  tools: readonly ToolSpec[];
  maxToolRounds: number;
  log: ToolLogger;
  now?: () => Date;
};

export class WeatherAgent {
  private readonly graph: DecisionGraph;
  private readonly now: () => Date;

  constructor(private readonly deps: WeatherAgentDeps) {
    this.graph = buildDecisionGraph(deps);
    this.now = deps.now ?? (() => new Date());
  }

  get modelName(): string {
    return this.deps.model.name;
  }

  /** System prompt, the most recent context turns, then the new question. */
  async prepareMessages(query: string, history: readonly HistoryTurnT[] = []): Promise<ChatMessage[]> {
    const system = await buildSystemPrompt(this.now());
    const recent = history.slice(-MAX_CONTEXT_MESSAGES).map((t): ChatMessage => ({ role: t.role, content: t.content }));
    return [{ role: 'system', content: system }, ...recent, { role: 'user', content: query }];
  }

  /**
   * Yields every tool call that will run and returns the final answer.
   * Failures propagate.
   */
  private async *runTurn(
    query: string,
    contextId: string,
    history: readonly HistoryTurnT[],
  ): AsyncGenerator<ToolCallRequest, string, undefined> {
    let rounds = 0;
    try {
      const messages = await this.prepareMessages(query, history);
      const stream = await this.graph.stream(
        { messages },
        { streamMode: 'values', recursionLimit: recursionLimitFor(this.deps.maxToolRounds) },
      );
      let answer: string | undefined;
      for await (const chunk of stream) {
        const snapshot = Snapshot.safeParse(chunk);
        if (!snapshot.success) continue;
        rounds = snapshot.data.toolRounds;
        // Calls past the round cap never run, so they get no notice.
        if (rounds < this.deps.maxToolRounds) yield* snapshot.data.pending;
        if (snapshot.data.answer !== undefined) answer = snapshot.data.answer;
      }
      observeTurn('completed', rounds);
      this.deps.log.info({ contextId, toolRounds: rounds, model: this.deps.model.name }, 'agent.turn.completed');
      return answer && answer.trim() ? answer : EMPTY_ANSWER_FALLBACK;
    } catch (err: unknown) {
      observeTurn('error', rounds);
      this.deps.log.error({ contextId, toolRounds: rounds, err }, 'agent.turn.failed');
      throw err;
    }
  }

  /**
   * Status notices for one turn: "processing", one notice per tool call, then
   * exactly one completed update. Errors become a completed apology.
   */
  async *stream(query: string, contextId: string, history: readonly HistoryTurnT[] = []): AsyncGenerator<AgentUpdate> {
    yield { state: 'working', content: PROCESSING_NOTICE };
    let answer: string;
    try {
      const turn = this.runTurn(query, contextId, history);
      let step = await turn.next();
      while (!step.done) {
        yield { state: 'working', content: describeToolCall(step.value) };
        step = await turn.next();
      }
      answer = step.value;
    } catch (err: unknown) {
      answer = `I encountered an error: ${errorMessage(err)}. Please try again.`;
    }
    yield { state: 'completed', content: answer };
  }

  async invoke(query: string, contextId: string, history: readonly HistoryTurnT[] = []): Promise<AgentResult> {
    try {
      const turn = this.runTurn(query, contextId, history);
      let step = await turn.next();
      while (!step.done) step = await turn.next();
      return { status: 'completed', message: step.value };
    } catch (err: unknown) {
      return { status: 'error', message: `Error: ${errorMessage(err)}` };
    }
  }
}

/**
 * Wires directory, weather provider and model from configuration. Without LLM
 * credentials the rule-based offline model drives the loop.
 */
export function createWeatherAgent(cfg: AgentConfig, log: ToolLogger, opts: { model?: ChatModel } = {}): WeatherAgent {
  const partners = createPartnerDirectory(cfg.partners, log);
  const weather = createWeatherProvider(cfg.weather, log);
  const model = opts.model ?? selectModel(cfg, log);
  log.info(
    { model: model.name, partners: partners.kind, weather: weather.name, maxToolRounds: cfg.maxToolRounds },
    'agent.init',
  );
  return new WeatherAgent({
    model,
    tools: createAgentTools({ partners, weather, log }),
    maxToolRounds: cfg.maxToolRounds,
    log,
  });
}

function selectModel(cfg: AgentConfig, log: ToolLogger): ChatModel {
  const { baseUrl, apiKey } = cfg.llm;
  if (baseUrl && apiKey) {
    return new OpenAICompatibleChatModel({ ...cfg.llm, baseUrl, apiKey }, log);
  }
  log.warn({ reason: 'no_llm_credentials' }, 'agent.model.offline');
  return new HeuristicChatModel();
}
