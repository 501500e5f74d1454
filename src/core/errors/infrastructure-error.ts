import { ApplicationError } from './application-error.js';
import type { MessageParam } from './domain-error.js';

export interface InfrastructureErrorOptions {
  statusCode?: number;
  code?: string;
  params?: readonly MessageParam[];
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Fallo de infraestructura (persistencia, servicios externos, registros inexistentes).
 * Se expone como error 500 salvo que se indique otro `statusCode`.
 */
export class InfrastructureError extends ApplicationError {
  public readonly params: readonly MessageParam[];

  constructor(message: string, options: InfrastructureErrorOptions = {}) {
    super(message, {
      statusCode: options.statusCode ?? 500,
      code: options.code ?? 'INFRASTRUCTURE_ERROR',
      metadata: options.metadata,
      cause: options.cause
    });
    this.name = 'InfrastructureError';
    this.params = options.params ?? [];
  }
}
