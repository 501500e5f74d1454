export { ApplicationError } from './application-error.js';
export type { ApplicationErrorOptions } from './application-error.js';
export { DomainError } from './domain-error.js';
export type { DomainErrorOptions, MessageParam } from './domain-error.js';
export { InfrastructureError } from './infrastructure-error.js';
export type { InfrastructureErrorOptions } from './infrastructure-error.js';
export { ParseError } from './parse-error.js';
