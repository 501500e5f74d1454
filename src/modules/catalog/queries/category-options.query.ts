import { QueryProcess } from '@core/queries/query-process.js';

import type { CategoryFilter, CategoryRepository } from '../repositories/category.repository.js';

export interface CategoryOption {
  value: string;
  label: string;
}

/**
 * Opciones de categorías activas para combos: `{ value: id, label: "CODIGO - Nombre" }`
 * ordenadas alfabéticamente por etiqueta.
 */
export class CategoryOptionsQuery extends QueryProcess<CategoryFilter, CategoryOption[]> {
  public constructor(private readonly categories: CategoryRepository) {
    super();
  }

  protected preProcess(context: CategoryFilter | null | undefined): asserts context is CategoryFilter {
    this.requireContext(context);
  }

  protected async process(context: CategoryFilter): Promise<CategoryOption[]> {
    const categories = await this.categories.findAll({ name: context.name, active: true });
    return categories.map((category) => ({
      value: category.id,
      label: `${category.code} - ${category.name}`
    }));
  }

  protected override async postProcess(_context: CategoryFilter, result: CategoryOption[]): Promise<CategoryOption[]> {
    return [...result].sort((left, right) => left.label.localeCompare(right.label));
  }
}
