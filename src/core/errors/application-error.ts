export interface ApplicationErrorOptions {
  statusCode?: number;
  code?: string;
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base de los errores controlados. La capa HTTP responde con `statusCode`; `code`
 * identifica el tipo de fallo en los logs.
 */
export class ApplicationError extends Error {
  public readonly statusCode: number;

  public readonly code: string;

  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, options: ApplicationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ApplicationError';
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_SERVER_ERROR';
    this.metadata = options.metadata;
  }
}
