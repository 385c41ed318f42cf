import { randomUUID } from 'crypto';
import {
  TERMINAL_STATES,
  type Artifact,
  type HistoryTurnT,
  type Task,
  type TaskEvent,
  type TaskRequestT,
} from '../schemas/task.js';
import { InvalidTaskStateError, TaskNotFoundError, UnsupportedOperationError } from '../tools/errors.js';
import type { ToolLogger } from '../util/logging.js';
import { MAX_CONTEXT_MESSAGES, type WeatherAgent } from './weather_agent.js';

export const RESULT_ARTIFACT_NAME = 'agent_result';

export interface TaskStore {
  get(id: string): Promise<Task | undefined>;
  save(task: Task): Promise<void>;
  listByContext(contextId: string): Promise<Task[]>;
}

/**
 * Process-local task store. Oldest tasks are evicted past `maxTasks`.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  constructor(private readonly maxTasks = 1000) {}

  async get(id: string): Promise<Task | undefined> {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  async save(task: Task): Promise<void> {
    this.tasks.delete(task.id);
    this.tasks.set(task.id, structuredClone(task));
    while (this.tasks.size > this.maxTasks) {
      const oldest = this.tasks.keys().next();
      if (oldest.done) break;
      this.tasks.delete(oldest.value);
    }
  }

  async listByContext(contextId: string): Promise<Task[]> {
    return [...this.tasks.values()]
      .filter((t) => t.contextId === contextId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((t) => structuredClone(t));
  }
}

export type Publish = (event: TaskEvent) => void | Promise<void>;

/**
 * Bridges inbound tasks to the agent: publishes the task, then each status
 * change, and the final answer as an artifact.
 */
export class TaskExecutor {
  constructor(
    private readonly agent: Pick<WeatherAgent, 'stream'>,
    private readonly store: TaskStore,
    private readonly log: ToolLogger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getTask(taskId: string): Promise<Task> {
    const task = await this.store.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  async execute(request: TaskRequestT, publish: Publish): Promise<Task> {
    const task = await this.resolveTask(request);
    const history = request.history ?? (await this.contextHistory(task.contextId));
    task.history.push({ role: 'user', text: request.query, at: this.stamp() });
    await this.commit(task);
    await publish({ kind: 'task', task: structuredClone(task) });

    const ids = { taskId: task.id, contextId: task.contextId };
    for await (const update of this.agent.stream(request.query, task.contextId, history)) {
      if (update.state === 'working') {
        task.state = 'working';
        await this.commit(task);
        await publish({ kind: 'status-update', ...ids, state: 'working', message: update.content, final: false });
        continue;
      }
      if (update.state === 'input_required') {
        task.state = 'input_required';
        task.history.push({ role: 'agent', text: update.content, at: this.stamp() });
        await this.commit(task);
        await publish({ kind: 'status-update', ...ids, state: 'input_required', message: update.content, final: true });
        break;
      }
      const artifact: Artifact = { name: RESULT_ARTIFACT_NAME, text: update.content };
      task.artifacts.push(artifact);
      task.history.push({ role: 'agent', text: update.content, at: this.stamp() });
      task.state = 'completed';
      await this.commit(task);
      await publish({ kind: 'artifact-update', ...ids, artifact, lastChunk: true });
      await publish({ kind: 'status-update', ...ids, state: 'completed', final: true });
      break;
    }

    this.log.info({ taskId: task.id, contextId: task.contextId, state: task.state }, 'task.finished');
    return structuredClone(task);
  }

  async cancel(taskId: string): Promise<void> {
    this.log.warn({ taskId }, 'task.cancel.unsupported');
    throw new UnsupportedOperationError('cancel');
  }

  private async resolveTask(request: TaskRequestT): Promise<Task> {
    if (request.taskId) {
      const existing = await this.store.get(request.taskId);
      if (!existing) throw new TaskNotFoundError(request.taskId);
      if (TERMINAL_STATES.includes(existing.state)) {
        throw new InvalidTaskStateError(existing.id, existing.state);
      }
      return existing;
    }
    const now = this.stamp();
    return {
      id: randomUUID(),
      contextId: request.contextId ?? randomUUID(),
      state: 'submitted',
      history: [],
      artifacts: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Earlier turns of the same context, oldest first, capped to the agent's window. */
  private async contextHistory(contextId: string): Promise<HistoryTurnT[]> {
    const tasks = await this.store.listByContext(contextId);
    const turns: HistoryTurnT[] = [];
    for (const t of tasks) {
      for (const m of t.history) {
        turns.push({ role: m.role === 'user' ? 'user' : 'assistant', content: m.text });
      }
    }
    return turns.slice(-MAX_CONTEXT_MESSAGES);
  }

  private async commit(task: Task): Promise<void> {
    task.updatedAt = this.stamp();
    await this.store.save(task);
  }

  private stamp(): string {
    return this.clock().toISOString();
  }
}
