// Los identificadores de MongoDB viajan como texto fuera de la capa de persistencia
export type EntityId = string;

/**
 * Forma mínima de una entidad persistida: identificador y marcas de auditoría.
 */
export interface AuditedEntity {
  readonly id: EntityId;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
