import type { Request, Response } from 'express';
import type { ErrorResponse } from './errorHandler.js';

export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  };
  res.status(404).json(response);
}
