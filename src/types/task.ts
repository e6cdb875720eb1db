export type TaskStatus = 'pending' | 'running' | 'completed' | 'error';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'error'];

export type TaskKind =
  | 'story-generation'
  | 'character-extraction'
  | 'page-image'
  | 'art-bible-image'
  | 'character-reference-image'
  | 'project-creation';

export interface Task<I = unknown, R = unknown> {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  input: Readonly<I>;
  result?: R;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

export type TaskOutcome<R = unknown> =
  | { ok: true; result: R }
  | { ok: false; error: string };

export type TaskCounts = Record<TaskStatus, number>;

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}
