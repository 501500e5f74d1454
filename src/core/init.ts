/**
 * Primer import del proceso: los modelos de Typegoose necesitan `reflect-metadata`
 * antes de declararse.
 */
import 'reflect-metadata';

import { logger } from '@infra/logger/logger.js';

let installed = false;

/**
 * Registra en el logger los fallos que escapan a cualquier manejador. Solo se
 * instala una vez por proceso.
 */
export const installProcessErrorHandlers = (): void => {
  if (installed) {
    return;
  }
  installed = true;

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ err: reason }, 'Promesa rechazada sin manejar');
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ err: error }, 'Excepción no capturada, se detiene el proceso');
    process.exit(1);
  });
};
