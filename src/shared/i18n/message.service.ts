import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { z } from 'zod';

import { env, SUPPORTED_LOCALES, type SupportedLocale } from '@config/index.js';
import type { MessageParam } from '@core/errors/index.js';
import { logger } from '@infra/logger/logger.js';

import { currentLocale } from './locale-context.js';

export type MessageCatalog = Readonly<Record<string, string>>;

const catalogSchema = z.record(z.string());

/**
 * Sustituye los marcadores `{0}`, `{1}`… por los parámetros en la misma posición.
 * Los marcadores sin parámetro se dejan intactos.
 */
export const formatMessage = (template: string, params: readonly MessageParam[]): string =>
  template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const value = params[Number(index)];
    return value === undefined ? placeholder : String(value);
  });

/**
 * Traducción de mensajes por clave. Busca en el catálogo del locale pedido, luego en
 * el del locale por defecto y, si la clave no existe, devuelve la propia clave.
 */
export class MessageService {
  public constructor(
    private readonly catalogs: ReadonlyMap<SupportedLocale, MessageCatalog>,
    private readonly defaultLocale: SupportedLocale = env.DEFAULT_LOCALE
  ) {}

  /**
   * Carga los catálogos `messages.<locale>.json` presentes en `directory`.
   */
  public static fromDirectory(directory: string = env.I18N_DIR): MessageService {
    const catalogs = new Map<SupportedLocale, MessageCatalog>();

    for (const locale of SUPPORTED_LOCALES) {
      const path = join(directory, `messages.${locale}.json`);
      if (!existsSync(path)) {
        continue;
      }

      const parsed = catalogSchema.safeParse(JSON.parse(readFileSync(path, 'utf8')));
      if (!parsed.success) {
        throw new Error(`Catálogo de mensajes inválido: ${path}`);
      }
      catalogs.set(locale, parsed.data);
    }

    if (catalogs.size === 0) {
      logger.warn({ directory }, 'No se encontraron catálogos de mensajes');
    }

    return new MessageService(catalogs);
  }

  public getMessage(key: string, ...params: MessageParam[]): string {
    return this.getMessageForLocale(key, currentLocale(), ...params);
  }

  public getMessageForLocale(key: string, locale: SupportedLocale, ...params: MessageParam[]): string {
    const template = this.catalogs.get(locale)?.[key] ?? this.catalogs.get(this.defaultLocale)?.[key];

    if (template === undefined) {
      logger.debug({ key, locale }, 'No se encontró traducción para la clave, se retorna la clave como mensaje');
      return key;
    }

    return formatMessage(template, params);
  }

  public hasMessage(key: string, locale: SupportedLocale = this.defaultLocale): boolean {
    return this.catalogs.get(locale)?.[key] !== undefined;
  }
}

export const messageService = MessageService.fromDirectory();
