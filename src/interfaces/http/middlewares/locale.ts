import type { NextFunction, Request, Response } from 'express';

import { env, SUPPORTED_LOCALES } from '@config/index.js';
import { resolveLocale, runWithLocale } from '@shared/i18n/locale-context.js';

/**
 * Fija el locale de la petición: primero `?lang=`, luego `Accept-Language` y, si
 * ninguno es soportado, el locale por defecto.
 */
export const localeMiddleware = (req: Request, _res: Response, next: NextFunction): void => {
  const fromQuery = typeof req.query.lang === 'string' ? resolveLocale(req.query.lang) : undefined;
  const accepted = req.headers['accept-language'] ? req.acceptsLanguages(...SUPPORTED_LOCALES) : false;
  const fromHeader = accepted ? resolveLocale(accepted) : undefined;

  runWithLocale(fromQuery ?? fromHeader ?? env.DEFAULT_LOCALE, () => {
    next();
  });
};
