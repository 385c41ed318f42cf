import { StateGraph, END, Annotation } from '@langchain/langgraph';
import type { ChatMessage, ChatModel, ToolCallRequest } from '../../core/llm.js';
import { ToolLoopLimitError } from '../../tools/errors.js';
import type { ToolLogger } from '../../util/logging.js';
import { executeToolCall, type ToolSpec } from '../tools/index.js';

export const DecisionState = Annotation.Root({
  messages: Annotation<ChatMessage[]>({
    reducer: (left, right) => left.concat(right),
    default: () => [],
  }),
  pending: Annotation<ToolCallRequest[]>({
    reducer: (_prev, next) => next,
    default: () => [],
  }),
  toolRounds: Annotation<number>({
    reducer: (_prev, next) => next,
    default: () => 0,
  }),
  answer: Annotation<string | undefined>,
});

export type DecisionStateT = typeof DecisionState.State;

export type DecisionGraphDeps = {
  model: ChatModel;
  tools: readonly ToolSpec[];
  maxToolRounds: number;
  log: ToolLogger;
};

/** Super-steps needed for `rounds` tool rounds plus the closing model call, with headroom. */
export function recursionLimitFor(rounds: number): number {
  return 2 * rounds + 5;
}

/**
 * model -> (tools -> model)* -> END. The tools node refuses to run once
 * `maxToolRounds` rounds have been spent.
 */
export function buildDecisionGraph(deps: DecisionGraphDeps) {
  const definitions = deps.tools.map((t) => t.spec);

  async function modelNode(state: DecisionStateT): Promise<Partial<DecisionStateT>> {
    const reply = await deps.model.complete({ messages: state.messages, tools: definitions });
    if (reply.kind === 'tool_requests' && reply.calls.length > 0) {
      deps.log.debug({ calls: reply.calls.map((c) => c.name), round: state.toolRounds + 1 }, 'agent.model.tool_requests');
      return {
        messages: [{ role: 'assistant', content: reply.text ?? '', toolCalls: reply.calls }],
        pending: reply.calls,
      };
    }
    const text = reply.kind === 'final' ? reply.text : reply.text ?? '';
    return { messages: [{ role: 'assistant', content: text }], pending: [], answer: text };
  }

  async function toolsNode(state: DecisionStateT): Promise<Partial<DecisionStateT>> {
    if (state.toolRounds >= deps.maxToolRounds) {
      throw new ToolLoopLimitError(deps.maxToolRounds);
    }
    const results: ChatMessage[] = [];
    // One call at a time, in request order.
    for (const call of state.pending) {
      const content = await executeToolCall(deps.tools, call, deps.log);
      results.push({ role: 'tool', toolCallId: call.id, name: call.name, content });
    }
    return { messages: results, pending: [], toolRounds: state.toolRounds + 1 };
  }

  function afterModel(state: DecisionStateT): 'tools' | 'end' {
    return state.pending.length > 0 ? 'tools' : 'end';
  }

  return new StateGraph(DecisionState)
    .addNode('model', modelNode)
    .addNode('tools', toolsNode)
    .addConditionalEdges('model', afterModel, { tools: 'tools', end: END })
    .addEdge('tools', 'model')
    .setEntryPoint('model')
    .compile();
}

export type DecisionGraph = ReturnType<typeof buildDecisionGraph>;
