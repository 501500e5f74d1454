import { ZodError } from 'zod';

import { ApplicationError } from './application-error.js';
import { InfrastructureError } from './infrastructure-error.js';

export type MessageParam = string | number | boolean;

export interface DomainErrorOptions {
  params?: readonly MessageParam[];
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Error unificado de dominio. Es el único tipo de error que escapa de
 * `CommandProcess.execute()`, sin importar la fase que falló.
 *
 * El mensaje puede ser texto libre o una clave de `MessageKeys`; la capa HTTP lo
 * traduce con `params` y, si no existe traducción, lo devuelve tal cual.
 */
export class DomainError extends ApplicationError {
  public readonly params: readonly MessageParam[];

  constructor(message: string, options: DomainErrorOptions = {}) {
    super(message, {
      statusCode: 400,
      code: 'DOMAIN_ERROR',
      metadata: options.metadata,
      cause: options.cause
    });
    this.name = 'DomainError';
    this.params = options.params ?? [];
  }

  /**
   * Construye el error unificado a partir de cualquier fallo conservando el mensaje
   * original y, si los tiene, sus parámetros. La causa queda encadenada en `cause`;
   * los errores de Zod se resumen como `ruta: mensaje`.
   */
  public static from(error: unknown): DomainError {
    if (error instanceof DomainError || error instanceof InfrastructureError) {
      return new DomainError(error.message, {
        params: error.params,
        metadata: error.metadata,
        cause: error
      });
    }

    if (error instanceof ZodError) {
      const message = error.errors
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join(', ');
      return new DomainError(message, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new DomainError(message, { cause: error });
  }
}
