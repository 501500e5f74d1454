import { config as loadEnv } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

/**
 * Carga los archivos `.env` relevantes según el `NODE_ENV` y valida las variables
 * de entorno. Centraliza la configuración del servicio y del executor asíncrono de
 * comandos para evitar arrancar con parámetros incompletos.
 */
const resolveEnvFiles = (): string[] => {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const candidates = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env'
  ];

  return candidates
    .map((fileName) => resolve(process.cwd(), fileName))
    .filter((absolutePath) => existsSync(absolutePath));
};

// El primer archivo encontrado tiene prioridad: dotenv no sobrescribe variables ya definidas
resolveEnvFiles().forEach((path) => {
  loadEnv({ path });
});

const optionalPositiveInt = z
  .union([z.coerce.number().int().positive(), z.literal('')])
  .optional()
  .transform((value) => (typeof value === 'number' ? value : undefined));

const commaSeparated = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

export const SUPPORTED_LOCALES = ['es', 'en', 'pt'] as const;

export type SupportedLocale = (typeof SUPPORTED_LOCALES)[number];

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(8080),
    SERVICE_NAME: z.string().min(1).default('plantilla-microservicio'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    MONGO_URI: z.string().min(1, 'MONGO_URI es obligatorio').default('mongodb://localhost:27017/plantilla'),
    MONGO_DB_NAME: z.string().min(1, 'MONGO_DB_NAME es obligatorio').default('plantilla'),
    CORS_ALLOWED_ORIGINS: commaSeparated,
    DEFAULT_LOCALE: z.enum(SUPPORTED_LOCALES).default('es'),
    I18N_DIR: z.string().min(1).default(resolve(process.cwd(), 'resources', 'i18n')),
    ASYNC_CORE_POOL_SIZE: z.coerce.number().int().positive().default(5),
    ASYNC_MAX_POOL_SIZE: z.coerce.number().int().positive().default(10),
    ASYNC_QUEUE_CAPACITY: z.coerce.number().int().nonnegative().default(500),
    ASYNC_TIMEOUT_MS: optionalPositiveInt
  })
  .refine((value) => value.ASYNC_MAX_POOL_SIZE >= value.ASYNC_CORE_POOL_SIZE, {
    message: 'ASYNC_MAX_POOL_SIZE debe ser mayor o igual que ASYNC_CORE_POOL_SIZE',
    path: ['ASYNC_MAX_POOL_SIZE']
  });

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  const formattedErrors = parsedEnv.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('\n');

  throw new Error(`Variables de entorno inválidas:\n${formattedErrors}`);
}

/**
 * Configuración validada del entorno de ejecución.
 */
export const env = parsedEnv.data;

export type AppEnv = typeof env;
