import { CommandProcess } from '@core/commands/command-process.js';
import { DomainError } from '@core/errors/index.js';
import type { TaskExecutor } from '@core/executor/task-executor.js';
import { logger } from '@infra/logger/logger.js';
import { MessageKeys } from '@shared/constants/message-keys.js';
import { DateUtils } from '@shared/utils/date.utils.js';

import { createCategorySchema, type CreateCategoryInput } from '../dtos/category.dto.js';
import type { CategoryEntity, CategoryRepository, NewCategory } from '../repositories/category.repository.js';

/**
 * Alta de categorías. El código se normaliza a mayúsculas y debe ser único.
 */
export class CreateCategoryCommand extends CommandProcess<CreateCategoryInput, CategoryEntity> {
  private draft: NewCategory | undefined;

  public constructor(
    private readonly categories: CategoryRepository,
    executor?: TaskExecutor
  ) {
    super(executor);
  }

  protected async preProcess(): Promise<void> {
    this.draft = undefined;

    const payload = createCategorySchema.parse(this.requireContext());
    const validFrom = payload.validFrom ? DateUtils.parseDate(payload.validFrom) : undefined;

    const existing = await this.categories.findByCode(payload.code);
    if (existing) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_DUPLICATED_CODE, { params: [payload.code] });
    }

    this.draft = { ...payload, validFrom };
    this.setValid(true);
  }

  protected async process(): Promise<void> {
    if (!this.draft) {
      throw new DomainError(MessageKeys.ERROR_DOMAIN_VALID_CREATE_EMPTY);
    }

    this.setResult(await this.categories.save(this.draft));
    this.setExecuted(true);
  }

  protected async postProcess(): Promise<void> {
    const category = this.getResult();
    if (category) {
      logger.info({ categoryId: category.id, code: category.code }, 'Categoría creada');
    }
  }
}
