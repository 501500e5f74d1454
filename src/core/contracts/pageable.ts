export type SortDirection = 'asc' | 'desc';

/**
 * Página solicitada. `pageNumber` empieza en 0.
 */
export interface PageRequest {
  pageNumber: number;
  pageSize: number;
  sortBy?: string;
  sortDir?: SortDirection;
}

/**
 * Contexto de las consultas paginadas: el filtro (`data`) más la página pedida.
 */
export interface PageContext<T> extends PageRequest {
  data: T;
}

export interface PageableResult<T> {
  content: T[];
  pageNumber: number;
  pageSize: number;
  totalElements: number;
  totalPages: number;
}

export const toPageableResult = <T>(content: T[], page: PageRequest, totalElements: number): PageableResult<T> => ({
  content,
  pageNumber: page.pageNumber,
  pageSize: page.pageSize,
  totalElements,
  totalPages: page.pageSize > 0 ? Math.ceil(totalElements / page.pageSize) : 0
});
