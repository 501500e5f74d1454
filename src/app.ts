import { installProcessErrorHandlers } from '@core/init.js';

import { createServer, type Server } from 'http';

import { env } from '@config/index.js';
import { asyncExecutor } from '@core/executor/async-executor.js';
import { connectMongo, disconnectMongo } from '@infra/db/mongo/connection.js';
import { logger } from '@infra/logger/logger.js';
import { createHttpApp } from '@interfaces/http/server.js';

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * Apagado ordenado: deja de aceptar peticiones, espera a que el executor vacíe su
 * cola y cierra la conexión con MongoDB.
 */
export const shutdown = async (server: Server): Promise<void> => {
  await closeServer(server);
  await asyncExecutor.shutdown();
  await disconnectMongo();
  logger.info('Servicio detenido');
};

/**
 * Arranca el servicio conectando MongoDB y levantando el servidor HTTP.
 */
export const bootstrap = async (): Promise<Server> => {
  installProcessErrorHandlers();
  await connectMongo();

  const httpServer = createServer(createHttpApp());

  httpServer.listen(env.PORT, () => {
    logger.info({ port: env.PORT, service: env.SERVICE_NAME }, 'Servidor HTTP iniciado');
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Señal de apagado recibida');
    shutdown(httpServer).catch((error: unknown) => {
      logger.fatal({ err: error }, 'Fallo durante el apagado');
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return httpServer;
};

// Solo arranca cuando el archivo se ejecuta directamente
if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Fallo crítico al iniciar la aplicación');
    process.exitCode = 1;
  });
}
