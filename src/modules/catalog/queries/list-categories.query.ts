import type { PageableResult, PageContext } from '@core/contracts/pageable.js';
import { DomainError } from '@core/errors/index.js';
import { QueryProcess } from '@core/queries/query-process.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

import {
  CATEGORY_SORT_FIELDS,
  type CategoryEntity,
  type CategoryFilter,
  type CategoryRepository
} from '../repositories/category.repository.js';

export const MAX_PAGE_SIZE = 100;

const isSortField = (value: string): boolean => (CATEGORY_SORT_FIELDS as readonly string[]).includes(value);

/**
 * Listado paginado de categorías filtrado por nombre (contiene, sin distinguir
 * mayúsculas) y estado.
 */
export class ListCategoriesQuery extends QueryProcess<PageContext<CategoryFilter>, PageableResult<CategoryEntity>> {
  public constructor(private readonly categories: CategoryRepository) {
    super();
  }

  protected preProcess(
    context: PageContext<CategoryFilter> | null | undefined
  ): asserts context is PageContext<CategoryFilter> {
    this.requireContext(context);

    if (!Number.isInteger(context.pageNumber) || context.pageNumber < 0) {
      throw new DomainError(MessageKeys.ERROR_ILLEGAL_ARGUMENT, { params: ['pageNumber'] });
    }
    if (!Number.isInteger(context.pageSize) || context.pageSize < 1 || context.pageSize > MAX_PAGE_SIZE) {
      throw new DomainError(MessageKeys.ERROR_ILLEGAL_ARGUMENT, { params: ['pageSize'] });
    }
    if (context.sortBy !== undefined && !isSortField(context.sortBy)) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_ENUM, { params: [context.sortBy, 'sortBy'] });
    }
  }

  protected async process(context: PageContext<CategoryFilter>): Promise<PageableResult<CategoryEntity>> {
    return await this.categories.findPage(context.data, {
      pageNumber: context.pageNumber,
      pageSize: context.pageSize,
      sortBy: context.sortBy,
      sortDir: context.sortDir
    });
  }
}
