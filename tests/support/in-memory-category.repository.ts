import { randomUUID } from 'node:crypto';

import { toPageableResult, type PageableResult, type PageRequest } from '../../src/core/contracts/pageable.js';
import type { EntityId } from '../../src/core/entities/base.entity.js';
import { InfrastructureError } from '../../src/core/errors/index.js';
import { MessageKeys } from '../../src/shared/constants/message-keys.js';
import type {
  CategoryEntity,
  CategoryFilter,
  CategoryRepository,
  NewCategory
} from '../../src/modules/catalog/repositories/category.repository.js';

type SortableField = 'code' | 'name' | 'createdAt' | 'updatedAt';

const isSortableField = (value: string): value is SortableField =>
  value === 'code' || value === 'name' || value === 'createdAt' || value === 'updatedAt';

const compareValues = (left: string | Date, right: string | Date): number =>
  left instanceof Date && right instanceof Date
    ? left.getTime() - right.getTime()
    : String(left).localeCompare(String(right));

/**
 * Repositorio en memoria con la misma semántica que `MongoCategoryRepository`.
 */
export class InMemoryCategoryRepository implements CategoryRepository {
  private readonly store = new Map<EntityId, CategoryEntity>();

  public constructor(seed: readonly CategoryEntity[] = []) {
    seed.forEach((category) => this.store.set(category.id, { ...category }));
  }

  public get size(): number {
    return this.store.size;
  }

  public async save(draft: NewCategory): Promise<CategoryEntity> {
    const now = new Date();
    const category: CategoryEntity = { ...draft, id: randomUUID(), createdAt: now, updatedAt: now };
    this.store.set(category.id, category);
    return { ...category };
  }

  public async saveAll(drafts: readonly NewCategory[]): Promise<CategoryEntity[]> {
    return await Promise.all(drafts.map((draft) => this.save(draft)));
  }

  public async update(entity: CategoryEntity): Promise<CategoryEntity> {
    if (!this.store.has(entity.id)) {
      throw new InfrastructureError(MessageKeys.ERROR_INFRASTRUCTURE_NO_REGISTRO_BY_ID, {
        statusCode: 404,
        params: [entity.id]
      });
    }

    const updated: CategoryEntity = { ...entity, updatedAt: new Date() };
    this.store.set(entity.id, updated);
    return { ...updated };
  }

  public async updateAll(entities: readonly CategoryEntity[]): Promise<CategoryEntity[]> {
    return await Promise.all(entities.map((entity) => this.update(entity)));
  }

  public async delete(id: EntityId): Promise<void> {
    this.store.delete(id);
  }

  public async deleteAll(ids: readonly EntityId[]): Promise<void> {
    ids.forEach((id) => this.store.delete(id));
  }

  public async findPage(filter: CategoryFilter, page: PageRequest): Promise<PageableResult<CategoryEntity>> {
    const field: SortableField = page.sortBy && isSortableField(page.sortBy) ? page.sortBy : 'createdAt';
    const direction = page.sortDir === 'asc' ? 1 : -1;

    const matching = this.filter(filter).sort((left, right) => direction * compareValues(left[field], right[field]));
    const start = page.pageNumber * page.pageSize;

    return toPageableResult(matching.slice(start, start + page.pageSize), page, matching.length);
  }

  public async findAll(filter: CategoryFilter): Promise<CategoryEntity[]> {
    return this.filter(filter).sort((left, right) => left.name.localeCompare(right.name));
  }

  public async findById(id: EntityId): Promise<CategoryEntity | null> {
    const category = this.store.get(id);
    return category ? { ...category } : null;
  }

  public async existsById(id: EntityId): Promise<boolean> {
    return this.store.has(id);
  }

  public async findByCode(code: string): Promise<CategoryEntity | null> {
    const upper = code.toUpperCase();
    const category = [...this.store.values()].find((candidate) => candidate.code === upper);
    return category ? { ...category } : null;
  }

  private filter(filter: CategoryFilter): CategoryEntity[] {
    const name = filter.name?.toLowerCase();
    return [...this.store.values()]
      .filter((category) => (name ? category.name.toLowerCase().includes(name) : true))
      .filter((category) => (filter.active !== undefined ? category.active === filter.active : true))
      .map((category) => ({ ...category }));
  }
}
