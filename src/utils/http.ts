import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiResponse } from '../types';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forwards a rejected route promise to the Express error handler.
 */
export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

const envelope = <T>(body: Omit<ApiResponse<T>, 'timestamp'>): ApiResponse<T> => ({
  ...body,
  timestamp: new Date().toISOString(),
});

export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => res.status(statusCode).json(envelope({ success: true, data, message }));

export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string
): Response => res.status(statusCode).json(envelope({ success: false, error, message }));
