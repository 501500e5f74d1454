import { CommandProcess } from '@core/commands/command-process.js';
import type { EntityId } from '@core/entities/base.entity.js';
import { DomainError } from '@core/errors/index.js';
import type { TaskExecutor } from '@core/executor/task-executor.js';
import { logger } from '@infra/logger/logger.js';
import { MessageKeys } from '@shared/constants/message-keys.js';
import { DateUtils } from '@shared/utils/date.utils.js';

import { updateCategorySchema, type UpdateCategoryInput } from '../dtos/category.dto.js';
import type { CategoryEntity, CategoryRepository } from '../repositories/category.repository.js';

export interface UpdateCategoryContext {
  id: EntityId;
  changes: UpdateCategoryInput;
}

export class UpdateCategoryCommand extends CommandProcess<UpdateCategoryContext, CategoryEntity> {
  private updated: CategoryEntity | undefined;

  public constructor(
    private readonly categories: CategoryRepository,
    executor?: TaskExecutor
  ) {
    super(executor);
  }

  protected async preProcess(): Promise<void> {
    this.updated = undefined;

    const { id, changes } = this.requireContext();
    if (!id || id.trim().length === 0) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_ID_EMPTY);
    }

    const payload = updateCategorySchema.parse(changes);
    const { validFrom: rawValidFrom, ...fields } = payload;
    const hasChanges = Object.values(payload).some((value) => value !== undefined);
    if (!hasChanges) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_UPDATE_EMPTY);
    }

    const current = await this.categories.findById(id);
    if (!current) {
      throw new DomainError(MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID, { params: [id] });
    }

    if (fields.code && fields.code !== current.code) {
      const sameCode = await this.categories.findByCode(fields.code);
      if (sameCode && sameCode.id !== current.id) {
        throw new DomainError(MessageKeys.ERROR_DOMAIN_DUPLICATED_CODE, { params: [fields.code] });
      }
    }

    this.updated = {
      ...current,
      code: fields.code ?? current.code,
      name: fields.name ?? current.name,
      description: fields.description ?? current.description,
      active: fields.active ?? current.active,
      validFrom: rawValidFrom ? DateUtils.parseDate(rawValidFrom) : current.validFrom
    };
    this.setValid(true);
  }

  protected async process(): Promise<void> {
    if (!this.updated) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_UPDATE_EMPTY);
    }

    this.setResult(await this.categories.update(this.updated));
    this.setExecuted(true);
  }

  protected async postProcess(): Promise<void> {
    const category = this.getResult();
    if (category) {
      logger.info({ categoryId: category.id }, 'Categoría actualizada');
    }
  }
}
