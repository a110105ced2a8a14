import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRequire } from 'module';
import { getEnvironmentConfig, type EnvironmentConfig } from './config/environment.js';
import v1Router from './routes/v1/index.js';
import { logger } from '../utils/logger.js';

const require = createRequire(import.meta.url);
const packageJson: { version?: string } = require('../../package.json');

const serverStartTime = Date.now();

function getAllowedOrigins(env: EnvironmentConfig): string[] {
  const origins = [...env.allowedOrigins];
  // Always allow localhost in development
  if (env.isDevelopment) {
    origins.push('http://localhost:3000', 'http://localhost:5173', 'http://localhost:8080');
  }
  return origins.length > 0 ? origins : ['http://localhost:3000'];
}

/**
 * Build the HTTP application. Kept separate from server.ts so tests can
 * drive it with supertest without binding a port.
 */
export function createApp(env: EnvironmentConfig = getEnvironmentConfig()): express.Application {
  const app = express();

  // Security: Helmet.js for HTTP security headers; the API serves JSON only
  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: false,
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"]
        }
      },
      hsts: env.isProduction,
      frameguard: { action: 'deny' }
    })
  );

  // Security: CORS configuration with allowed origins
  const allowedOrigins = getAllowedOrigins(env);
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (curl, same-origin)
        if (!origin) return callback(null, true);

        if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
          callback(null, true);
        } else {
          logger.warn(`CORS request blocked from origin: ${origin}`);
          callback(new Error('Not allowed by CORS'));
        }
      },
      optionsSuccessStatus: 200
    })
  );

  app.use(express.json({ limit: '1mb' }));

  const apiRouter = express.Router();

  // Health check endpoint for monitoring
  apiRouter.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: packageJson.version ?? 'unknown',
      uptime: Date.now() - serverStartTime
    });
  });

  apiRouter.use('/v1', v1Router);
  app.use('/api', apiRouter);

  app.use('/api', (_req: express.Request, res: express.Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: 'Unknown API endpoint'
    });
  });

  // Error handling middleware
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal Server Error',
      message: env.isDevelopment ? err.message : 'Something went wrong'
    });
  });

  return app;
}
