import type { AssociationValue, Entity, FieldValue } from '../../src/domain/entities/Entity.js';
import { buildEntity } from '../../src/domain/entities/Entity.js';
import type { SchemaRegistry } from '../../src/domain/schema/SchemaRegistry.js';

export const LOADED_AT = '2024-01-01T00:00:00.000Z';

/**
 * Entity as storage would hand it back, without touching a database
 */
export function loadedEntity(
  registry: SchemaRegistry,
  type: string,
  fields: Record<string, FieldValue> = {},
  associations: Record<string, AssociationValue> = {}
): Entity {
  return {
    ...buildEntity(registry, type, fields, associations),
    state: 'loaded',
    insertedAt: LOADED_AT,
    updatedAt: LOADED_AT,
  };
}
