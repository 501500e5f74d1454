import { CommandProcess } from '@core/commands/command-process.js';
import type { EntityId } from '@core/entities/base.entity.js';
import { DomainError } from '@core/errors/index.js';
import type { TaskExecutor } from '@core/executor/task-executor.js';
import { logger } from '@infra/logger/logger.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

import type { CategoryEntity, CategoryRepository } from '../repositories/category.repository.js';

export interface DeleteCategoryContext {
  id: EntityId;
}

/**
 * Baja física de una categoría. Devuelve la categoría eliminada.
 */
export class DeleteCategoryCommand extends CommandProcess<DeleteCategoryContext, CategoryEntity> {
  private target: CategoryEntity | undefined;

  public constructor(
    private readonly categories: CategoryRepository,
    executor?: TaskExecutor
  ) {
    super(executor);
  }

  protected async preProcess(): Promise<void> {
    this.target = undefined;

    const { id } = this.requireContext();
    if (!id || id.trim().length === 0) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_ID_EMPTY);
    }

    const current = await this.categories.findById(id);
    if (!current) {
      throw new DomainError(MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID, { params: [id] });
    }

    this.target = current;
    this.setValid(true);
  }

  protected async process(): Promise<void> {
    if (!this.target) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_ID_EMPTY);
    }

    await this.categories.delete(this.target.id);
    this.setResult(this.target);
    this.setExecuted(true);
  }

  protected async postProcess(): Promise<void> {
    logger.info({ categoryId: this.target?.id }, 'Categoría eliminada');
  }
}
