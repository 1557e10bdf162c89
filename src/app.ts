import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

// Request bodies carry batches of up to 10k transactions
const JSON_BODY_LIMIT = '10mb';

/**
 * Origins come from CORS_ORIGIN; "*" allows any. Requests without an
 * Origin header (curl, the run script) are always allowed.
 */
const corsOptions = (allowedOrigins: readonly string[]): CorsOptions => ({
  origin: (origin, callback) => {
    const allowed =
      !origin || allowedOrigins.includes('*') || allowedOrigins.includes(origin);
    callback(null, allowed);
  },
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
});

const apiLimiter = () =>
  rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    message: {
      success: false,
      error: 'Too many requests, please try again later',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

const serviceInfo = () => ({
  success: true,
  message: 'Client Reconciliation API',
  version: process.env.npm_package_version || '1.0.0',
  health: `${env.API_PREFIX}/health`,
  registry: `${env.API_PREFIX}/registry`,
  reconciliation: `${env.API_PREFIX}/reconciliation`,
  timestamp: new Date().toISOString(),
});

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security
  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions(env.CORS_ORIGIN)));
  app.use(apiLimiter());

  // Parsing, compression, request log
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(compression());
  app.use(requestLogger);

  app.use(env.API_PREFIX, routes);
  app.get('/', (_req, res) => {
    res.json(serviceInfo());
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
