import { v4 as uuidv4 } from 'uuid';
import { ApiError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { isTerminal, Task, TaskCounts, TaskKind, TaskStatus } from '../types/task';

/**
 * In-memory task registry owned by the orchestrator.
 *
 * The store is the only place task status changes, and it only allows
 * pending -> running -> completed | error. Terminal tasks are frozen.
 * Callers always get deep copies, never the stored record, so a polled
 * result or input can be mutated without touching the next poll.
 */
export class TaskStore {
  private readonly tasks = new Map<string, Task>();

  create<I>(kind: TaskKind, input: I, now: number = Date.now()): Task<I> {
    const task: Task<I> = {
      id: uuidv4(),
      kind,
      status: 'pending',
      input: structuredClone(input),
      createdAt: now,
    };
    this.tasks.set(task.id, task);
    logger.debug({ taskId: task.id, kind }, '[Tasks] Created task');
    return copyOf(task);
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? copyOf(task) : undefined;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  markRunning(id: string, now: number = Date.now()): Task {
    return this.transition(id, 'pending', { status: 'running', startedAt: now });
  }

  markCompleted(id: string, result: unknown, now: number = Date.now()): Task {
    return this.transition(id, 'running', { status: 'completed', result: structuredClone(result), completedAt: now });
  }

  markFailed(id: string, error: string, now: number = Date.now()): Task {
    const message = error.trim() || 'Task failed';
    return this.transition(id, 'running', { status: 'error', error: message, completedAt: now });
  }

  list(status?: TaskStatus): Task[] {
    const all = Array.from(this.tasks.values());
    return (status ? all.filter((t) => t.status === status) : all)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((t) => copyOf(t));
  }

  /** Only terminal tasks may be removed. */
  delete(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task || !isTerminal(task.status)) return false;
    return this.tasks.delete(id);
  }

  counts(): TaskCounts {
    const counts: TaskCounts = { pending: 0, running: 0, completed: 0, error: 0 };
    for (const task of this.tasks.values()) counts[task.status] += 1;
    return counts;
  }

  get size(): number {
    return this.tasks.size;
  }

  private transition(id: string, from: TaskStatus, update: Partial<Task>): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new ApiError(`Task ${id} does not exist`, 500);
    }
    if (task.status !== from) {
      throw new ApiError(`Illegal task transition ${task.status} -> ${update.status} for ${id}`, 500);
    }
    const next: Task = { ...task, ...update };
    this.tasks.set(id, next);
    return copyOf(next);
  }
}

function copyOf<I>(task: Task<I>): Task<I> {
  return structuredClone(task);
}
