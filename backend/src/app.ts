import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { corsOrigins, type Env } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { notFoundHandler } from './middleware/notFoundHandler';
import { createSessionRoutes } from './routes/session';
import type { SessionController } from './services/sessionController';
import { createLogger } from './utils/logger';

const logger = createLogger('http');

export type AppEnv = Pick<
  Env,
  'NODE_ENV' | 'VIDEO_FOLDER' | 'CORS_ORIGINS' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'
>;

export const createApp = (session: SessionController, env: AppEnv) => {
  const app = express();

  // Trust proxy when in production
  if (env.NODE_ENV === 'production') {
    app.set('trust proxy', 1);
  }

  // Security middleware; media is embedded by the comparison page
  app.use(helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  }));
  app.use(cors({
    origin: corsOrigins(env),
    credentials: true,
  }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      if (req.path.startsWith('/api/')) {
        logger.info(`${req.method} ${req.path} - ${res.statusCode} - ${Date.now() - start}ms`, { ip: req.ip });
      }
    });
    next();
  });

  if (env.RATE_LIMIT_MAX_REQUESTS) {
    app.use('/api/', rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        logger.warn(`⚠️ Rate limit reached for IP: ${req.ip}`);
        res.status(429).json({
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests from this IP, please try again later.',
          },
          timestamp: new Date().toISOString(),
        });
      },
    }));
  }

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      session: session.currentState,
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  app.use('/api/session', createSessionRoutes(session, { videoFolder: env.VIDEO_FOLDER }));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
