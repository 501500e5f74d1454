import { DomainError } from '@core/errors/index.js';
import type { UseCase } from '@core/use-cases/use-case.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

/**
 * Plantilla base de las consultas (lecturas sin efectos secundarios). `execute`
 * ejecuta siempre `preProcess`, `process` y `postProcess`, en ese orden y sin saltos.
 *
 * `preProcess` valida y acota el contexto: debe lanzar `DomainError` si es nulo o
 * incompleto. Los errores de cualquier fase llegan al llamador sin transformar.
 */
export abstract class QueryProcess<C, R> implements UseCase<C | null | undefined, R> {
  public async execute(context: C | null | undefined): Promise<R> {
    this.preProcess(context);
    const result = await this.process(context);
    return this.postProcess(context, result);
  }

  protected abstract preProcess(context: C | null | undefined): asserts context is C;

  protected abstract process(context: C): Promise<R>;

  /**
   * Transforma o enriquece el resultado. Por defecto lo devuelve sin cambios.
   */
  protected async postProcess(_context: C, result: R): Promise<R> {
    return result;
  }

  protected requireContext(context: C | null | undefined): asserts context is C {
    if (context === null || context === undefined) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_CONTEXTO_NULL);
    }
  }
}
