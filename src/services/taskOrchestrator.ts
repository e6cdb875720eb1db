import pLimit from 'p-limit';
import { z } from 'zod';
import { TaskStore } from '../repository/taskStore';
import { isTerminal, Task, TaskCounts, TaskKind, TaskOutcome, TaskStatus } from '../types/task';
import { errorMessage, NotFoundError, ValidationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

/**
 * A job kind as the orchestrator sees it: input validation that runs at
 * submission time, and the work itself.
 */
export interface JobDefinition {
  /** Throws ValidationError; the returned value is what gets stored on the task. */
  validate(input: unknown): unknown;
  run(input: unknown): Promise<unknown>;
}

export type JobRegistry = Partial<Record<TaskKind, JobDefinition>>;

export function zodIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

export function defineJob<I, R>(
  schema: z.ZodType<I, z.ZodTypeDef, unknown>,
  run: (input: I) => Promise<R>
): JobDefinition {
  const validate = (input: unknown): I => {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid job input', zodIssues(parsed.error));
    }
    return parsed.data;
  };
  return {
    validate,
    run: (input) => run(validate(input)),
  };
}

const TASK_KINDS: readonly TaskKind[] = [
  'story-generation',
  'character-extraction',
  'page-image',
  'art-bible-image',
  'character-reference-image',
  'project-creation',
];

function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export interface TaskOrchestratorOptions {
  concurrency: number;
  /** Terminal tasks older than this are evicted by `sweep`; 0 keeps them. */
  retentionMs?: number;
  /** Running tasks older than this are failed by `sweep`; 0 disables. */
  runningTimeoutMs?: number;
  now?: () => number;
}

export interface TaskStats extends TaskCounts {
  total: number;
  active: number;
  queued: number;
}

export interface SweepResult {
  timedOut: string[];
  evicted: string[];
}

/**
 * Runs submitted jobs on a fixed-size worker pool.
 *
 * `submit` returns synchronously; the job is handed to the pool on a later
 * macrotask, so nothing reaches a provider before the caller has the id.
 * Anything a job throws ends up as the task's `error` and never leaves the
 * worker.
 */
export class TaskOrchestrator {
  private readonly pool: ReturnType<typeof pLimit>;
  private readonly waiters = new Map<string, Array<(task: Task) => void>>();
  // ids failed by the running timeout; their late results are dropped
  private readonly abandoned = new Set<string>();
  private readonly retentionMs: number;
  private readonly runningTimeoutMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: TaskStore,
    private readonly jobs: JobRegistry,
    options: TaskOrchestratorOptions
  ) {
    this.pool = pLimit(Math.max(1, options.concurrency));
    this.retentionMs = options.retentionMs ?? 0;
    this.runningTimeoutMs = options.runningTimeoutMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  submit(kind: string, input: unknown): string {
    if (!isTaskKind(kind)) {
      throw new ValidationError(`Unknown task kind: ${kind}`, { allowed: TASK_KINDS });
    }
    const job = this.jobs[kind];
    if (!job) {
      throw new ValidationError(`Task kind ${kind} is not enabled`);
    }
    const validated = job.validate(input);
    const task = this.store.create(kind, validated, this.now());

    setImmediate(() => {
      this.pool(() => this.execute(task.id, job)).catch((err: unknown) => {
        logger.error({ taskId: task.id, err }, '[Tasks] Worker failed outside job boundary');
      });
    });

    logger.info({ taskId: task.id, kind }, '[Tasks] Task submitted');
    return task.id;
  }

  status(taskId: string): Task {
    const task = this.store.get(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    return task;
  }

  result(taskId: string): TaskOutcome {
    const task = this.status(taskId);
    if (task.status === 'completed') return { ok: true, result: task.result };
    if (task.status === 'error') return { ok: false, error: task.error ?? 'Task failed' };
    throw new ValidationError(`Task ${taskId} is still ${task.status}`, { status: task.status });
  }

  list(status?: TaskStatus): Task[] {
    return this.store.list(status);
  }

  /** Resolves once the task is terminal. For in-process callers and tests. */
  waitFor(taskId: string): Promise<Task> {
    const task = this.status(taskId);
    if (isTerminal(task.status)) return Promise.resolve(task);
    return new Promise((resolve) => {
      const pending = this.waiters.get(taskId) ?? [];
      pending.push(resolve);
      this.waiters.set(taskId, pending);
    });
  }

  stats(): TaskStats {
    return {
      ...this.store.counts(),
      total: this.store.size,
      active: this.pool.activeCount,
      queued: this.pool.pendingCount,
    };
  }

  /** Applies the running-timeout and retention policies. */
  sweep(now: number = this.now()): SweepResult {
    const result: SweepResult = { timedOut: [], evicted: [] };

    if (this.runningTimeoutMs > 0) {
      for (const task of this.store.list('running')) {
        if (task.startedAt === undefined || now - task.startedAt <= this.runningTimeoutMs) continue;
        this.abandoned.add(task.id);
        const failed = this.store.markFailed(task.id, `Task exceeded running timeout of ${this.runningTimeoutMs}ms`, now);
        this.notify(failed);
        result.timedOut.push(task.id);
      }
    }

    if (this.retentionMs > 0) {
      for (const task of this.store.list()) {
        if (!isTerminal(task.status) || task.completedAt === undefined) continue;
        if (now - task.completedAt <= this.retentionMs) continue;
        if (this.store.delete(task.id)) result.evicted.push(task.id);
      }
    }

    if (result.timedOut.length || result.evicted.length) {
      logger.info({ timedOut: result.timedOut.length, evicted: result.evicted.length }, '[Tasks] Sweep finished');
    }
    return result;
  }

  startSweeping(intervalMs: number): void {
    if (this.sweepTimer || (this.retentionMs <= 0 && this.runningTimeoutMs <= 0)) return;
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  private async execute(taskId: string, job: JobDefinition): Promise<void> {
    const running = this.store.markRunning(taskId, this.now());
    logger.info({ taskId, kind: running.kind }, '[Tasks] Task started');

    let finished: Task;
    try {
      const result = await job.run(running.input);
      if (this.dropIfAbandoned(taskId)) return;
      finished = this.store.markCompleted(taskId, result, this.now());
      logger.info({ taskId, kind: running.kind, ms: this.elapsed(finished) }, '[Tasks] Task completed');
    } catch (err) {
      if (this.dropIfAbandoned(taskId)) return;
      const message = errorMessage(err);
      finished = this.store.markFailed(taskId, message, this.now());
      logger.error({ taskId, kind: running.kind, err }, '[Tasks] Task failed');
    }
    this.notify(finished);
  }

  private dropIfAbandoned(taskId: string): boolean {
    if (!this.abandoned.delete(taskId)) return false;
    logger.warn({ taskId }, '[Tasks] Discarding outcome of timed-out task');
    return true;
  }

  private elapsed(task: Task): number | undefined {
    return task.startedAt !== undefined && task.completedAt !== undefined
      ? task.completedAt - task.startedAt
      : undefined;
  }

  private notify(task: Task): void {
    const pending = this.waiters.get(task.id);
    if (!pending) return;
    this.waiters.delete(task.id);
    for (const resolve of pending) resolve(task);
  }
}
