/**
 * Fallo al interpretar la estructura de un valor (fechas, números, identificadores).
 */
export class ParseError extends Error {
  public readonly input: string | undefined;

  constructor(message: string, input?: string) {
    super(message);
    this.name = 'ParseError';
    this.input = input;
  }
}
