import { Router } from 'express';
import { ProjectController } from '../controllers/projectController';
import { TaskController } from '../controllers/taskController';
import { generationLimiter, pollingLimiter } from '../middlewares/rateLimiter';
import { handleValidationErrors, validateStoryIdParam, validateTaskIdParam } from '../middlewares/validateRequest';

// Story-specific entry points onto the task API
export function createStoryRoutes(controller: TaskController, projects: ProjectController): Router {
  const router = Router();

  router.post('/async', generationLimiter, controller.submitKind('story-generation'));
  router.get('/status/:taskId', pollingLimiter, validateTaskIdParam, handleValidationErrors, controller.getTask);

  router.post('/extract-characters', generationLimiter, controller.submitKind('character-extraction'));
  router.get(
    '/extract-characters/status/:taskId',
    pollingLimiter,
    validateTaskIdParam,
    handleValidationErrors,
    controller.getTask
  );

  // after the fixed paths above so they are never read as a story id
  router.get('/:storyId', pollingLimiter, validateStoryIdParam, handleValidationErrors, projects.getStory);

  return router;
}
