import { DomainError, InfrastructureError } from '@core/errors/index.js';
import type { PageableResult } from '@core/contracts/pageable.js';
import { MessageKeys } from '@shared/constants/message-keys.js';
import { messageService, type MessageService } from '@shared/i18n/message.service.js';

import { GenericResponse } from './generic-response.js';

/**
 * Construye respuestas `GenericResponse` con los mensajes traducidos al locale de la
 * petición en curso.
 */
export class ApiResponseBuilder {
  public constructor(private readonly messages: MessageService = messageService) {}

  public success<T>(dato: T, mensaje?: string): GenericResponse<T> {
    return GenericResponse.success(200, mensaje ?? this.messages.getMessage(MessageKeys.SUCCESS_OPERATION), dato);
  }

  public created<T>(dato: T, mensaje?: string): GenericResponse<T> {
    return GenericResponse.success(201, mensaje ?? this.messages.getMessage(MessageKeys.SUCCESS_CREATED), dato);
  }

  public successList<T>(datos: T[] | null | undefined, mensaje?: string): GenericResponse<T> {
    return GenericResponse.successList(
      200,
      mensaje ?? this.messages.getMessage(MessageKeys.SUCCESS_OPERATION),
      datos ?? []
    );
  }

  /**
   * Respuesta paginada. `totales` describe la página actual (base 1) y el total de
   * páginas; una página vacía se responde como lista vacía.
   */
  public paginated<T>(page: PageableResult<T> | null | undefined, mensaje?: string): GenericResponse<T> {
    if (!page || page.totalElements === 0) {
      return GenericResponse.successList(200, mensaje ?? this.messages.getMessage(MessageKeys.SUCCESS_NO_RESULTS), []);
    }

    const totalPages = Math.ceil(page.totalElements / page.pageSize);
    const currentPage = page.pageNumber + 1;

    return GenericResponse.successPaginated(
      200,
      mensaje ?? this.messages.getMessage(MessageKeys.SUCCESS_PAGINATED),
      page.content,
      page.totalElements,
      this.messages.getMessage(MessageKeys.SUCCESS_PAGE_INFO, currentPage, totalPages)
    );
  }

  public error(codigo: number, mensaje: string): GenericResponse<never> {
    return GenericResponse.error(codigo, mensaje);
  }

  /**
   * Traduce el mensaje del error (si es una clave conocida) con sus parámetros.
   */
  public fromError(error: Error, codigo: number): GenericResponse<never> {
    const params = error instanceof DomainError || error instanceof InfrastructureError ? error.params : [];
    return GenericResponse.error(codigo, this.messages.getMessage(error.message, ...params));
  }

  public badRequest(mensaje: string): GenericResponse<never> {
    return GenericResponse.error(400, mensaje);
  }

  public notFound(mensaje: string): GenericResponse<never> {
    return GenericResponse.error(404, mensaje);
  }
}

export const apiResponseBuilder = new ApiResponseBuilder();
