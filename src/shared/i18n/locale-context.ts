import { AsyncLocalStorage } from 'node:async_hooks';

import { env, SUPPORTED_LOCALES, type SupportedLocale } from '@config/index.js';

const storage = new AsyncLocalStorage<SupportedLocale>();

const isSupportedLocale = (value: string): value is SupportedLocale =>
  (SUPPORTED_LOCALES as readonly string[]).includes(value);

/**
 * Normaliza una etiqueta de idioma (`en-US`, `PT_br`, `es`) a un locale soportado.
 * Devuelve `undefined` si no hay coincidencia.
 */
export const resolveLocale = (candidate: string | null | undefined): SupportedLocale | undefined => {
  if (!candidate) {
    return undefined;
  }

  const language = candidate.trim().toLowerCase().split(/[-_]/)[0] ?? '';
  return isSupportedLocale(language) ? language : undefined;
};

/**
 * Ejecuta `callback` con el locale indicado disponible para todo su flujo asíncrono.
 */
export const runWithLocale = <T>(locale: SupportedLocale, callback: () => T): T => storage.run(locale, callback);

/**
 * Locale de la petición en curso o el locale por defecto.
 */
export const currentLocale = (): SupportedLocale => storage.getStore() ?? env.DEFAULT_LOCALE;
