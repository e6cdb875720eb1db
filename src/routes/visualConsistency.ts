import { Router } from 'express';
import { VisualConsistencyController } from '../controllers/visualConsistencyController';
import { pollingLimiter } from '../middlewares/rateLimiter';
import { handleValidationErrors, validateBody, validateStoryIdParam } from '../middlewares/validateRequest';
import { ArtBiblePromptSchema, CharacterReferencePromptSchema, StorySessionSchema } from '../schemas/sessionSchemas';

export function createVisualConsistencyRoutes(controller: VisualConsistencyController): Router {
  const router = Router();

  router.post('/art-bible/generate-prompt', validateBody(ArtBiblePromptSchema), controller.generateArtBiblePrompt);
  router.post(
    '/character-reference/generate-prompt',
    validateBody(CharacterReferencePromptSchema),
    controller.generateCharacterReferencePrompt
  );

  router.get('/session/:storyId', pollingLimiter, validateStoryIdParam, handleValidationErrors, controller.getSessionStatus);
  router.post('/session/ensure', validateBody(StorySessionSchema), controller.ensureSession);
  router.post('/session/rebuild', validateBody(StorySessionSchema), controller.rebuildSession);
  router.post('/session/clear', validateBody(StorySessionSchema), controller.clearSession);

  return router;
}
