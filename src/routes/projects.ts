import { Router } from 'express';
import { ProjectController } from '../controllers/projectController';
import { TaskController } from '../controllers/taskController';
import { generationLimiter, pollingLimiter } from '../middlewares/rateLimiter';
import { handleValidationErrors, validateProjectIdParam, validateTaskIdParam } from '../middlewares/validateRequest';

export function createProjectRoutes(controller: ProjectController, tasks: TaskController): Router {
  const router = Router();

  router.get('/', pollingLimiter, controller.listProjects);
  // story, characters and every page illustration as one task
  router.post('/', generationLimiter, tasks.submitKind('project-creation'));
  router.get('/status/:taskId', pollingLimiter, validateTaskIdParam, handleValidationErrors, tasks.getTask);

  router.get('/:projectId', pollingLimiter, validateProjectIdParam, handleValidationErrors, controller.getProject);
  router.delete('/:projectId', validateProjectIdParam, handleValidationErrors, controller.deleteProject);

  return router;
}
