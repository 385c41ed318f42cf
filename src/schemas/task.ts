import { z } from 'zod';

export const HistoryTurn = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
export type HistoryTurnT = z.infer<typeof HistoryTurn>;

export const TaskRequest = z.object({
  query: z.string().trim().min(1).max(4000),
  contextId: z.string().min(1).max(128).optional(),
  taskId: z.string().min(1).max(128).optional(),
  history: z.array(HistoryTurn).max(50).optional(),
});
export type TaskRequestT = z.infer<typeof TaskRequest>;

export type TaskState = 'submitted' | 'working' | 'input_required' | 'completed' | 'canceled' | 'failed';

export const TERMINAL_STATES: readonly TaskState[] = ['completed', 'canceled', 'failed'];

export type TaskMessage = { role: 'user' | 'agent'; text: string; at: string };

export type Artifact = { name: string; text: string };

export type Task = {
  id: string;
  contextId: string;
  state: TaskState;
  history: TaskMessage[];
  artifacts: Artifact[];
  createdAt: string;
  updatedAt: string;
};

export type TaskEvent =
  | { kind: 'task'; task: Task }
  | { kind: 'status-update'; taskId: string; contextId: string; state: TaskState; message?: string; final: boolean }
  | { kind: 'artifact-update'; taskId: string; contextId: string; artifact: Artifact; lastChunk: boolean };
