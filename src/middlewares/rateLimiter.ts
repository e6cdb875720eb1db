/**
 * Rate Limiting Middleware
 *
 * - Submission endpoints: 30 requests/min (each one starts provider work)
 * - Polling endpoints: 5000 requests/min, effectively unlimited for status checks
 * - Global: 300 write requests/min
 */

import rateLimit from 'express-rate-limit';

// Global rate limiter - fallback for all routes
export const globalLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 300,
  message: {
    responseStatus: 'error',
    message: 'Too many requests, please try again later',
    data: null,
  },
  standardHeaders: true,
  legacyHeaders: false,
  // polling is read-only
  skip: (req) => req.method === 'GET',
});

// Task submission - each request may start minutes of provider work
export const generationLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 30,
  message: {
    responseStatus: 'error',
    message: 'Generation rate limit exceeded, please slow down',
    data: null,
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.method === 'GET',
});

// Polling endpoints - very high limit for status checks
export const pollingLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 5000,
  message: {
    responseStatus: 'error',
    message: 'Polling rate limit exceeded',
    data: null,
  },
  standardHeaders: true,
  legacyHeaders: false,
});
