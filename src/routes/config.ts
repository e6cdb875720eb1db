import { Router } from 'express';
import { getStoryConfig } from '../config/storyConfig';
import { formatApiResponse } from '../utils/formatApiResponse';

const router = Router();

// Story defaults and the allowed parameter lists
router.get('/', (_req, res) => {
  res.json(formatApiResponse('success', 'OK', getStoryConfig()));
});

export default router;
