import compression from 'compression';
import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';

import { env } from '@config/index.js';

import { globalErrorHandler, notFoundHandler } from './middlewares/error-handler.js';
import { localeMiddleware } from './middlewares/locale.js';
import { registerHttpRoutes, type HttpDependencies } from './routes/index.js';

/**
 * Crea y configura la aplicación Express aplicando middlewares de seguridad, parsing
 * e idioma. Las dependencias no indicadas usan sus implementaciones por defecto
 * (MongoDB y el executor asíncrono global).
 */
export const createHttpApp = (dependencies: HttpDependencies = {}): Express => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production' ? undefined : false,
      crossOriginEmbedderPolicy: false
    })
  );

  app.use(
    cors({
      origin: env.CORS_ALLOWED_ORIGINS,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(localeMiddleware);

  registerHttpRoutes(app, dependencies);

  app.use(notFoundHandler);
  app.use(globalErrorHandler);

  return app;
};
