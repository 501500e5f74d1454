export { env, SUPPORTED_LOCALES } from './env.js';
export type { AppEnv, SupportedLocale } from './env.js';
