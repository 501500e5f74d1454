/**
 * Sobre unificado de todas las respuestas de la API. Los campos sin valor no se
 * incluyen en el JSON.
 */
export interface GenericResponse<T> {
  ok: boolean;
  codigo: number;
  mensaje: string;
  dato?: T;
  datos?: T[];
  conteo?: number;
  totales?: string;
}

export const GenericResponse = {
  success<T>(codigo: number, mensaje: string, dato: T): GenericResponse<T> {
    return { ok: true, codigo, mensaje, dato };
  },

  successList<T>(codigo: number, mensaje: string, datos: T[]): GenericResponse<T> {
    return { ok: true, codigo, mensaje, datos, conteo: datos.length };
  },

  successPaginated<T>(
    codigo: number,
    mensaje: string,
    datos: T[],
    conteo: number,
    totales: string
  ): GenericResponse<T> {
    return { ok: true, codigo, mensaje, datos, conteo, totales };
  },

  error<T = never>(codigo: number, mensaje: string): GenericResponse<T> {
    return { ok: false, codigo, mensaje };
  }
};
