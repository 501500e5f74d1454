import type { EntityId } from '@core/entities/base.entity.js';
import { DomainError, InfrastructureError } from '@core/errors/index.js';
import { QueryProcess } from '@core/queries/query-process.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

import type { CategoryEntity, CategoryRepository } from '../repositories/category.repository.js';

export interface GetCategoryContext {
  id: EntityId;
}

export class GetCategoryQuery extends QueryProcess<GetCategoryContext, CategoryEntity> {
  public constructor(private readonly categories: CategoryRepository) {
    super();
  }

  protected preProcess(context: GetCategoryContext | null | undefined): asserts context is GetCategoryContext {
    this.requireContext(context);
    if (!context.id || context.id.trim().length === 0) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_ID_EMPTY);
    }
  }

  protected async process(context: GetCategoryContext): Promise<CategoryEntity> {
    const category = await this.categories.findById(context.id);
    if (!category) {
      throw new InfrastructureError(MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID, {
        statusCode: 404,
        params: [context.id]
      });
    }
    return category;
  }
}
