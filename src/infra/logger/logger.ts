import { pino, type LevelWithSilent, type LoggerOptions, type TransportSingleOptions } from 'pino';

import { env } from '@config/index.js';

// Salida legible solo en desarrollo; el resto de entornos emite JSON por stdout
const prettyTransport = (): TransportSingleOptions | undefined =>
  env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l' }
      }
    : undefined;

const defaultLevel: Record<typeof env.NODE_ENV, LevelWithSilent> = {
  development: 'debug',
  test: 'silent',
  production: 'info'
};

const options: LoggerOptions = {
  level: env.LOG_LEVEL ?? defaultLevel[env.NODE_ENV],
  transport: prettyTransport(),
  base: { service: env.SERVICE_NAME }
};

/**
 * Logger del servicio. Cada entrada lleva el campo `service`; los errores se pasan
 * como `{ err }` para que Pino serialice la pila.
 */
export const logger = pino(options);

export type Logger = typeof logger;
