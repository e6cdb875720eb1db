import { Router } from 'express';
import { query } from 'express-validator';
import { TaskController } from '../controllers/taskController';
import { generationLimiter, pollingLimiter } from '../middlewares/rateLimiter';
import { handleValidationErrors, validateBody, validateTaskIdParam } from '../middlewares/validateRequest';
import { SubmitTaskSchema } from '../schemas/taskSchemas';

export function createTaskRoutes(controller: TaskController): Router {
  const router = Router();

  router.post('/', generationLimiter, validateBody(SubmitTaskSchema), controller.submitTask);

  router.get(
    '/',
    pollingLimiter,
    query('status').optional().isIn(['pending', 'running', 'completed', 'error']),
    handleValidationErrors,
    controller.listTasks
  );

  // Poll a task until it is completed or error
  router.get('/:taskId', pollingLimiter, validateTaskIdParam, handleValidationErrors, controller.getTask);

  return router;
}
