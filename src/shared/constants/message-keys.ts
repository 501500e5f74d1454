/**
 * Claves de los catálogos de mensajes (`resources/i18n/messages.<locale>.json`).
 */
export const MessageKeys = {
  // Éxito
  SUCCESS_OPERATION: 'success.operation',
  SUCCESS_CREATED: 'success.created',
  SUCCESS_NO_CONTENT: 'success.no.content',
  SUCCESS_PAGINATED: 'success.paginated',
  SUCCESS_NO_RESULTS: 'success.no.results',
  SUCCESS_PAGE_INFO: 'success.page.info',

  // Errores generales
  ERROR_INTERNAL_SERVER: 'error.internal.server',
  ERROR_BAD_REQUEST: 'error.bad.request',
  ERROR_NOT_FOUND: 'error.not.found',
  ERROR_UNAUTHORIZED: 'error.unauthorized',
  ERROR_FORBIDDEN: 'error.forbidden',

  // Validación
  ERROR_VALIDATION_PREFIX: 'error.validation.prefix',
  ERROR_CONSTRAINT_VIOLATION: 'error.constraint.violation',
  ERROR_ILLEGAL_ARGUMENT: 'error.illegal.argument',
  ERROR_TYPE_MISMATCH: 'error.type.mismatch',
  ERROR_JSON_INVALID: 'error.json.invalid',
  ERROR_PARAMETER_MISSING: 'error.parameter.missing',
  ERROR_ENDPOINT_NOT_FOUND: 'error.endpoint.not.found',

  // Base de datos
  ERROR_DATA_INTEGRITY: 'error.data.integrity',

  // Dominio
  ERROR_DOMAIN_VALID_ENUM: 'error.domain.valid.enum',
  ERROR_DOMAIN_VALID_ID_EMPTY: 'error.domain.valid.id.empty',
  ERROR_DOMAIN_VALID_CONTEXTO_NULL: 'error.domain.valid.contexto.null',
  ERROR_DOMAIN_VALID_CREATE_EMPTY: 'error.domain.valid.create.empty',
  ERROR_DOMAIN_VALID_UPDATE_EMPTY: 'error.domain.valid.update.empty',
  ERROR_DOMAIN_DUPLICATED_CODE: 'error.domain.duplicated.code',

  // Pipeline de comandos
  ERROR_COMMAND_INVALID: 'error.command.invalid',
  ERROR_COMMAND_TIMEOUT: 'error.command.timeout',

  // Executor asíncrono
  ERROR_EXECUTOR_SATURATED: 'error.executor.saturated',
  ERROR_EXECUTOR_SHUTDOWN: 'error.executor.shutdown',

  // Infraestructura
  ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID: 'error.infrastructure.no.registro.by.id'
} as const;

export type MessageKey = (typeof MessageKeys)[keyof typeof MessageKeys];
