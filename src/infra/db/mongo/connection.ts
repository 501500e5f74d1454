import mongoose from 'mongoose';

import { env } from '@config/index.js';
import { logger } from '@infra/logger/logger.js';

let connectionPromise: Promise<typeof mongoose> | null = null;

/**
 * Conexión singleton con MongoDB. Llamadas concurrentes comparten la misma promesa.
 */
export const connectMongo = async (): Promise<typeof mongoose> => {
  if (mongoose.connection.readyState === 1 || mongoose.connection.readyState === 2) {
    return mongoose;
  }

  if (!connectionPromise) {
    mongoose.set('strictQuery', true);

    mongoose.connection.on('error', (error) => {
      logger.error({ err: error }, 'Error en la conexión de MongoDB');
    });

    mongoose.connection.on('disconnected', () => {
      logger.warn('MongoDB desconectado');
      connectionPromise = null;
    });

    connectionPromise = mongoose
      .connect(env.MONGO_URI, {
        dbName: env.MONGO_DB_NAME,
        maxPoolSize: env.ASYNC_MAX_POOL_SIZE * 2,
        autoIndex: env.NODE_ENV !== 'production',
        serverSelectionTimeoutMS: 30000,
        socketTimeoutMS: 45000
      })
      .then((instance) => {
        logger.info({ dbName: env.MONGO_DB_NAME }, 'Conexión a MongoDB establecida');
        return instance;
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error al conectar con MongoDB');
        connectionPromise = null;
        throw error;
      });
  }

  return connectionPromise;
};

/**
 * Cierra la conexión activa de Mongoose. Utilizado en el apagado ordenado.
 */
export const disconnectMongo = async (): Promise<void> => {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    logger.info('Conexión a MongoDB cerrada');
  }
  connectionPromise = null;
};
