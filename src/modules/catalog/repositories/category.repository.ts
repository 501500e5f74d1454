import type { DocumentType } from '@typegoose/typegoose';
import mongoose from 'mongoose';

import type { CommandRepository, QueryRepository } from '@core/contracts/repository.js';
import { toPageableResult, type PageableResult, type PageRequest } from '@core/contracts/pageable.js';
import type { AuditedEntity, EntityId } from '@core/entities/base.entity.js';
import { InfrastructureError } from '@core/errors/index.js';
import { MessageKeys } from '@shared/constants/message-keys.js';

import { Category, CategoryModel } from '../models/category.model.js';

export interface CategoryEntity extends AuditedEntity {
  code: string;
  name: string;
  description?: string;
  active: boolean;
  validFrom?: Date;
}

export interface NewCategory {
  code: string;
  name: string;
  description?: string;
  active: boolean;
  validFrom?: Date;
}

export interface CategoryFilter {
  name?: string;
  active?: boolean;
}

export interface CategoryRepository
  extends CommandRepository<CategoryEntity, EntityId, NewCategory>,
    QueryRepository<CategoryEntity, EntityId, CategoryFilter> {
  findByCode(code: string): Promise<CategoryEntity | null>;
}

export const CATEGORY_SORT_FIELDS = ['code', 'name', 'createdAt', 'updatedAt'] as const;

const toDomainCategory = (doc: DocumentType<Category>): CategoryEntity => {
  const plain = doc.toObject<Category & { _id: mongoose.Types.ObjectId }>();

  return {
    id: plain._id.toString(),
    code: plain.code,
    name: plain.name,
    description: plain.description,
    active: plain.active,
    validFrom: plain.validFrom,
    createdAt: plain.createdAt,
    updatedAt: plain.updatedAt
  };
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const buildFilter = (filter: CategoryFilter) => ({
  ...(filter.name ? { name: { $regex: escapeRegExp(filter.name), $options: 'i' } } : {}),
  ...(filter.active !== undefined ? { active: filter.active } : {})
});

export class MongoCategoryRepository implements CategoryRepository {
  public async save(draft: NewCategory): Promise<CategoryEntity> {
    const category = await CategoryModel.create({
      code: draft.code,
      name: draft.name,
      description: draft.description,
      active: draft.active,
      validFrom: draft.validFrom
    });

    return toDomainCategory(category);
  }

  public async saveAll(drafts: readonly NewCategory[]): Promise<CategoryEntity[]> {
    return await Promise.all(drafts.map((draft) => this.save(draft)));
  }

  public async update(entity: CategoryEntity): Promise<CategoryEntity> {
    const category = await CategoryModel.findByIdAndUpdate(
      entity.id,
      {
        $set: {
          code: entity.code,
          name: entity.name,
          description: entity.description,
          active: entity.active,
          validFrom: entity.validFrom
        }
      },
      { new: true, runValidators: true }
    ).exec();

    if (!category) {
      throw new InfrastructureError(MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID, {
        statusCode: 404,
        params: [entity.id]
      });
    }

    return toDomainCategory(category);
  }

  public async updateAll(entities: readonly CategoryEntity[]): Promise<CategoryEntity[]> {
    return await Promise.all(entities.map((entity) => this.update(entity)));
  }

  public async delete(id: EntityId): Promise<void> {
    await CategoryModel.findByIdAndDelete(id).exec();
  }

  public async deleteAll(ids: readonly EntityId[]): Promise<void> {
    await CategoryModel.deleteMany({ _id: { $in: [...ids] } }).exec();
  }

  public async findPage(filter: CategoryFilter, page: PageRequest): Promise<PageableResult<CategoryEntity>> {
    const query = buildFilter(filter);
    const sortField = page.sortBy ?? 'createdAt';
    const sortOrder = page.sortDir === 'asc' ? 1 : -1;

    const [categories, total] = await Promise.all([
      CategoryModel.find(query)
        .sort({ [sortField]: sortOrder })
        .skip(page.pageNumber * page.pageSize)
        .limit(page.pageSize)
        .exec(),
      CategoryModel.countDocuments(query).exec()
    ]);

    return toPageableResult(
      categories.map((category) => toDomainCategory(category)),
      page,
      total
    );
  }

  public async findAll(filter: CategoryFilter): Promise<CategoryEntity[]> {
    const categories = await CategoryModel.find(buildFilter(filter)).sort({ name: 1 }).exec();
    return categories.map((category) => toDomainCategory(category));
  }

  public async findById(id: EntityId): Promise<CategoryEntity | null> {
    if (!mongoose.isValidObjectId(id)) {
      return null;
    }

    const category = await CategoryModel.findById(id).exec();
    return category ? toDomainCategory(category) : null;
  }

  public async existsById(id: EntityId): Promise<boolean> {
    if (!mongoose.isValidObjectId(id)) {
      return false;
    }

    const found = await CategoryModel.exists({ _id: id }).exec();
    return found !== null;
  }

  public async findByCode(code: string): Promise<CategoryEntity | null> {
    const category = await CategoryModel.findOne({ code: code.toUpperCase() }).exec();
    return category ? toDomainCategory(category) : null;
  }
}
