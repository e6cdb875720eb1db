import { param, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { zodIssues } from '../services/taskOrchestrator';
import { formatApiResponse } from '../utils/formatApiResponse';

export const validateTaskIdParam = [
  param('taskId').isString().trim().isLength({ min: 1, max: 128 }).withMessage('taskId must be 1-128 characters'),
];

export const validateStoryIdParam = [
  param('storyId')
    .isString()
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('storyId must be 1-128 characters'),
];

export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const result = validationResult(req);
  if (!result.isEmpty()) {
    return res.status(400).json(formatApiResponse('error', 'Validation failed', { errors: result.array() }));
  }
  return next();
}

export const validateProjectIdParam = [
  param('projectId')
    .isString()
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('projectId must be 1-128 characters'),
];

/** Replaces req.body with the parsed value, or answers 400 with the zod issues. */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res
        .status(400)
        .json(formatApiResponse('error', 'Validation failed', { errors: zodIssues(parsed.error) }));
    }
    req.body = parsed.data;
    return next();
  };
}
