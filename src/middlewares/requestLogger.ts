import { Request, Response } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan writes through winston at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Nothing in tests; liveness checks are not worth a line
const skip = (req: Request): boolean =>
  env.NODE_ENV === 'test' || req.originalUrl.endsWith('/health/live');

export const requestLogger = morgan<Request, Response>(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
