import { Router } from 'express';
import type { AppContainer } from '../app/container';
import { createProjectController } from '../controllers/projectController';
import { createTaskController } from '../controllers/taskController';
import { createVisualConsistencyController } from '../controllers/visualConsistencyController';
import configRoutes from './config';
import { createProjectRoutes } from './projects';
import { createStoryRoutes } from './stories';
import { createTaskRoutes } from './tasks';
import { createVisualConsistencyRoutes } from './visualConsistency';

export function createRoutes(container: AppContainer): Router {
  const router = Router();
  const taskController = createTaskController(container.orchestrator);
  const projectController = createProjectController({ projects: container.projects, sessions: container.sessions });
  const visualConsistencyController = createVisualConsistencyController({
    sessions: container.sessions,
    projects: container.projects,
  });

  router.use('/tasks', createTaskRoutes(taskController));
  router.use('/stories', createStoryRoutes(taskController, projectController));
  router.use('/projects', createProjectRoutes(projectController, taskController));
  router.use('/visual-consistency', createVisualConsistencyRoutes(visualConsistencyController));
  router.use('/config', configRoutes);

  return router;
}
