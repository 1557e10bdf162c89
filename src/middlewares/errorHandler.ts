import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

interface ResolvedError {
  statusCode: number;
  message: string;
  isOperational: boolean;
}

// body-parser marks malformed JSON with type "entity.parse.failed"
const isJsonSyntaxError = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

const resolveError = (err: Error): ResolvedError => {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, message: err.message, isOperational: err.isOperational };
  }
  if (err instanceof MulterError) {
    const message = err.code === 'LIMIT_FILE_SIZE' ? 'Uploaded file is too large' : err.message;
    return { statusCode: 400, message, isOperational: true };
  }
  if (isJsonSyntaxError(err)) {
    return { statusCode: 400, message: 'Malformed JSON body', isOperational: true };
  }
  return { statusCode: 500, message: 'Internal Server Error', isOperational: false };
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const { statusCode, message, isOperational } = resolveError(err);

  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error (${statusCode}): ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
