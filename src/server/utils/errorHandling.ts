/**
 * Error handling utilities for route handlers
 */

import { Request, Response, NextFunction } from 'express';

/**
 * Wraps an async route handler to automatically catch errors and pass them to Express error middleware
 *
 * Usage:
 * ```typescript
 * router.post('/verify', asyncHandler(async (req, res) => {
 *   const result = await service.verify(request);
 *   res.json(result);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
