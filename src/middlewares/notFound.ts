import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * 404 handler for requests no route matched
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(NotFoundError.forRoute(req.method, req.originalUrl));
}
