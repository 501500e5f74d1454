import type { NextFunction, Request, Response } from 'express';
import mongoose from 'mongoose';
import { ZodError } from 'zod';

import { ApplicationError, DomainError } from '@core/errors/index.js';
import { logger } from '@infra/logger/logger.js';
import { MessageKeys } from '@shared/constants/message-keys.js';
import { apiResponseBuilder } from '@shared/http/api-response.builder.js';
import { messageService } from '@shared/i18n/message.service.js';

const isJsonBodyError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

/**
 * Middleware global de captura de errores para la capa HTTP. Responde siempre con
 * `GenericResponse`: los errores de dominio como 400 con su mensaje traducido, los de
 * infraestructura con su `statusCode` y el resto como 500 sin detalles internos.
 */
export const globalErrorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (error instanceof ZodError) {
    const violations = error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    logger.warn({ issues: error.errors }, 'Restricciones de validación incumplidas');
    res
      .status(400)
      .json(apiResponseBuilder.badRequest(messageService.getMessage(MessageKeys.ERROR_CONSTRAINT_VIOLATION, violations)));
    return;
  }

  if (isJsonBodyError(error)) {
    logger.warn('Cuerpo JSON inválido');
    res.status(400).json(apiResponseBuilder.badRequest(messageService.getMessage(MessageKeys.ERROR_JSON_INVALID)));
    return;
  }

  if (error instanceof mongoose.Error.CastError) {
    logger.warn({ path: error.path, kind: error.kind }, 'Tipo de parámetro inválido');
    res
      .status(400)
      .json(
        apiResponseBuilder.badRequest(messageService.getMessage(MessageKeys.ERROR_TYPE_MISMATCH, error.path, error.kind))
      );
    return;
  }

  if (isDuplicateKeyError(error)) {
    logger.warn({ err: error }, 'Violación de integridad de datos');
    res.status(400).json(apiResponseBuilder.badRequest(messageService.getMessage(MessageKeys.ERROR_DATA_INTEGRITY)));
    return;
  }

  if (error instanceof DomainError) {
    logger.warn({ code: error.code, params: error.params, metadata: error.metadata }, 'Error de dominio');
    res.status(400).json(apiResponseBuilder.fromError(error, 400));
    return;
  }

  if (error instanceof ApplicationError) {
    logger.error({ err: error, code: error.code, metadata: error.metadata }, 'Error de aplicación');
    res.status(error.statusCode).json(apiResponseBuilder.fromError(error, error.statusCode));
    return;
  }

  logger.error({ err: error }, 'Error no controlado');

  res.status(500).json(apiResponseBuilder.error(500, messageService.getMessage(MessageKeys.ERROR_INTERNAL_SERVER)));
};

/**
 * Respuesta 404 para rutas no registradas.
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res
    .status(404)
    .json(apiResponseBuilder.notFound(messageService.getMessage(MessageKeys.ERROR_ENDPOINT_NOT_FOUND, req.originalUrl)));
};
