import { Request, Response, NextFunction } from 'express';
import { SubmitTaskRequest } from '../schemas/taskSchemas';
import { TaskOrchestrator } from '../services/taskOrchestrator';
import { Task, TaskKind, TaskStatus } from '../types/task';
import { formatApiResponse } from '../utils/formatApiResponse';

const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'running', 'completed', 'error'];

export interface TaskView {
  taskId: string;
  kind: TaskKind;
  status: TaskStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  result?: unknown;
  error?: string;
}

function iso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

// A failed task has the same shape as a finished one, with `error` set instead of `result`.
export function toTaskView(task: Task): TaskView {
  return {
    taskId: task.id,
    kind: task.kind,
    status: task.status,
    createdAt: new Date(task.createdAt).toISOString(),
    startedAt: iso(task.startedAt),
    completedAt: iso(task.completedAt),
    ...(task.status === 'completed' ? { result: task.result } : {}),
    ...(task.status === 'error' ? { error: task.error } : {}),
  };
}

function statusFilter(value: unknown): TaskStatus | undefined {
  return TASK_STATUSES.find((status) => status === value);
}

export function createTaskController(orchestrator: TaskOrchestrator) {
  /**
   * POST /api/tasks
   * Body: { kind, input }. Answers 202 with the new task id.
   */
  function submitTask(req: Request, res: Response, next: NextFunction) {
    try {
      const { kind, input }: SubmitTaskRequest = req.body;
      const taskId = orchestrator.submit(kind, input);
      return res
        .status(202)
        .json(formatApiResponse('success', 'Task submitted', { taskId, status: orchestrator.status(taskId).status }));
    } catch (err) {
      return next(err);
    }
  }

  /** Submits the whole request body as the input of a fixed task kind. */
  function submitKind(kind: TaskKind) {
    return (req: Request, res: Response, next: NextFunction) => {
      try {
        const taskId = orchestrator.submit(kind, req.body);
        return res
          .status(202)
          .json(formatApiResponse('success', 'Task submitted', { taskId, status: orchestrator.status(taskId).status }));
      } catch (err) {
        return next(err);
      }
    };
  }

  /**
   * GET /api/tasks/:taskId
   * Poll target; the view only carries `result` or `error` once terminal.
   */
  function getTask(req: Request, res: Response, next: NextFunction) {
    try {
      const task = orchestrator.status(req.params.taskId);
      return res.json(formatApiResponse('success', `Task ${task.status}`, toTaskView(task)));
    } catch (err) {
      return next(err);
    }
  }

  function listTasks(req: Request, res: Response, next: NextFunction) {
    try {
      const tasks = orchestrator.list(statusFilter(req.query.status)).map(toTaskView);
      return res.json(formatApiResponse('success', 'OK', { stats: orchestrator.stats(), tasks }));
    } catch (err) {
      return next(err);
    }
  }

  return { submitTask, submitKind, getTask, listTasks };
}

export type TaskController = ReturnType<typeof createTaskController>;
