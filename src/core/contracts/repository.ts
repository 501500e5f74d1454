import type { EntityId } from '../entities/base.entity.js';
import type { PageableResult, PageRequest } from './pageable.js';

/**
 * Operaciones de escritura de un repositorio genérico. Los repositorios de cada
 * módulo combinan este contrato con `QueryRepository` y añaden sus métodos propios.
 * `TDraft` son los datos de alta, sin identificador ni campos de auditoría.
 */
export interface CommandRepository<TEntity, TKey = EntityId, TDraft = TEntity> {
  save(draft: TDraft): Promise<TEntity>;
  saveAll(drafts: readonly TDraft[]): Promise<TEntity[]>;
  update(entity: TEntity): Promise<TEntity>;
  updateAll(entities: readonly TEntity[]): Promise<TEntity[]>;
  delete(id: TKey): Promise<void>;
  deleteAll(ids: readonly TKey[]): Promise<void>;
}

/**
 * Operaciones de lectura de un repositorio genérico. `TFilter` describe el ejemplo
 * con el que se filtran los listados.
 */
export interface QueryRepository<TEntity, TKey = EntityId, TFilter = Partial<TEntity>> {
  findPage(filter: TFilter, page: PageRequest): Promise<PageableResult<TEntity>>;
  findAll(filter: TFilter): Promise<TEntity[]>;
  findById(id: TKey): Promise<TEntity | null>;
  existsById(id: TKey): Promise<boolean>;
}
