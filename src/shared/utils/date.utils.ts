import { ParseError } from '@core/errors/index.js';

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

type DatePattern = (value: string) => CalendarDate | null;

const MS_PER_DAY = 86_400_000;

const isValidCalendarDate = ({ year, month, day }: CalendarDate): boolean => {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
};

const pattern =
  (regex: RegExp, order: readonly ['year' | 'month' | 'day', 'year' | 'month' | 'day', 'year' | 'month' | 'day']): DatePattern =>
  (value) => {
    const match = regex.exec(value);
    if (!match) {
      return null;
    }

    const parts: CalendarDate = { year: 0, month: 0, day: 0 };
    order.forEach((field, index) => {
      parts[field] = Number(match[index + 1]);
    });

    return isValidCalendarDate(parts) ? parts : null;
  };

const DD_MM_YYYY = pattern(/^(\d{2})\/(\d{2})\/(\d{4})$/, ['day', 'month', 'year']);
const YYYY_MM_DD = pattern(/^(\d{4})-(\d{2})-(\d{2})$/, ['year', 'month', 'day']);
const MM_DD_YYYY = pattern(/^(\d{2})\/(\d{2})\/(\d{4})$/, ['month', 'day', 'year']);
const ISO_OFFSET_DATE = pattern(/^(\d{4})-(\d{2})-(\d{2})(?:Z|[+-]\d{2}:\d{2})$/, ['year', 'month', 'day']);

// Orden de prueba: el primer formato que encaja gana
const ANY_DATE_PATTERNS: readonly DatePattern[] = [DD_MM_YYYY, YYYY_MM_DD, MM_DD_YYYY, ISO_OFFSET_DATE];

const pad = (value: number, length = 2): string => value.toString().padStart(length, '0');

const parseAnyFormat = (value: string): CalendarDate | null => {
  for (const parse of ANY_DATE_PATTERNS) {
    const parsed = parse(value.trim());
    if (parsed) {
      return parsed;
    }
  }
  return null;
};

/**
 * Utilidades de fechas en formato `dd/MM/yyyy`, el formato de intercambio de la API.
 */
export const DateUtils = {
  FORMAT_DD_MM_YYYY: 'dd/MM/yyyy',

  /**
   * Convierte `dd/MM/yyyy` en la medianoche local de ese día.
   * @throws {ParseError} si el texto no es una fecha válida en ese formato.
   */
  parseDate(value: string): Date {
    const parsed = DD_MM_YYYY(value.trim());
    if (!parsed) {
      throw new ParseError(`La fecha '${value}' no tiene el formato ${DateUtils.FORMAT_DD_MM_YYYY}`, value);
    }
    return new Date(parsed.year, parsed.month - 1, parsed.day);
  },

  formatDate(date: Date): string {
    return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${pad(date.getFullYear(), 4)}`;
  },

  /**
   * Toma la parte de fecha de un texto ISO (`2024-03-15T10:00:00+02:00`) y la
   * devuelve como `dd/MM/yyyy`, sin convertir zonas horarias.
   */
  formatIsoDate(value: string | null | undefined): string | null {
    if (!value) {
      return null;
    }

    const parsed = YYYY_MM_DD(value.slice(0, 10));
    return parsed ? `${pad(parsed.day)}/${pad(parsed.month)}/${pad(parsed.year, 4)}` : null;
  },

  /**
   * Días naturales entre dos fechas, en valor absoluto. Acepta `dd/MM/yyyy`,
   * `yyyy-MM-dd`, `MM/dd/yyyy` y fecha ISO con zona; devuelve -1 si alguna no se
   * puede interpretar.
   */
  daysBetween(start: string, end: string): number {
    const startDate = parseAnyFormat(start);
    const endDate = parseAnyFormat(end);
    if (!startDate || !endDate) {
      return -1;
    }

    const startMs = Date.UTC(startDate.year, startDate.month - 1, startDate.day);
    const endMs = Date.UTC(endDate.year, endDate.month - 1, endDate.day);
    return Math.abs(Math.round((endMs - startMs) / MS_PER_DAY));
  }
};
