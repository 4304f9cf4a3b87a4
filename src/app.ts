import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import session from 'express-session';
import swaggerUi from 'swagger-ui-express';
import { createRoutes, RouteServices } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { specs } from './swagger';
import { logger } from './utils/logger';

export const SESSION_COOKIE_NAME = 'wol_gateway.sid';

export interface AppOptions {
  sessionSecret: string;
  cookieSecure: boolean;
  unlockTtlMs: number;
  trustProxy: boolean;
  corsOrigins: string[];
}

export function isAllowedCorsOrigin(origin: string, allowedOrigins: string[]): boolean {
  if (allowedOrigins.includes('*')) return true;
  return allowedOrigins.includes(origin);
}

export function createApp(services: RouteServices, options: AppOptions): express.Application {
  const app = express();
  app.set('trust proxy', options.trustProxy);

  // Security
  app.use(helmet());
  app.use(
    cors({
      origin:
        options.corsOrigins.length === 0
          ? false
          : (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
              // Allow requests with no origin (curl, server-to-server)
              if (!origin) return callback(null, true);
              const allowed = isAllowedCorsOrigin(origin, options.corsOrigins);
              if (!allowed) {
                logger.warn('Blocked by CORS policy', { origin });
              }
              callback(null, allowed);
            },
      credentials: true,
      optionsSuccessStatus: 204,
    })
  );

  // Body parsing
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));

  // Unlock records and the admin login live in this cookie-backed session
  app.use(
    session({
      name: SESSION_COOKIE_NAME,
      secret: options.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: options.cookieSecure,
        maxAge: options.unlockTtlMs,
      },
    })
  );

  // Request logging
  app.use((req, _res, next) => {
    logger.debug('Incoming request', {
      method: req.method,
      path: req.path,
    });
    next();
  });

  // API Documentation
  app.use(
    '/api-docs',
    swaggerUi.serve,
    swaggerUi.setup(specs, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'WoL Gateway API Documentation',
    })
  );

  app.use(createRoutes(services));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
