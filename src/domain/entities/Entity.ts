import { randomUUID } from 'node:crypto';
import { ContractViolationError } from '../errors.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';

/**
 * Entity - the mutable, currently-true record of some entity type
 * P1 (Single Responsibility): carries state only, persistence lives in infra
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type FieldValue = JsonValue;

/** Marks an association that was never fetched; never the same as "empty" */
export const NOT_LOADED: unique symbol = Symbol('association not loaded');
export type NotLoaded = typeof NOT_LOADED;

export type EntityState = 'built' | 'loaded' | 'deleted';

export type AssociationValue = Entity | Entity[] | null | NotLoaded;

export interface Entity {
  type: string;
  id: string;
  state: EntityState;
  insertedAt: string | null;
  updatedAt: string | null;
  /** Id of the newest version row, only kept for types that expose it */
  versionId: string | null;
  fields: Record<string, FieldValue>;
  associations: Record<string, AssociationValue>;
}

/**
 * Factory for an unsaved entity. Unlisted fields become null and unlisted
 * associations NOT_LOADED.
 */
export function buildEntity(
  registry: SchemaRegistry,
  type: string,
  fields: Record<string, FieldValue> = {},
  associations: Record<string, AssociationValue> = {},
  id: string = randomUUID()
): Entity {
  const descriptor = registry.get(type);
  const entityFields: Record<string, FieldValue> = {};
  for (const field of descriptor.fields) {
    entityFields[field.name] = fields[field.name] ?? null;
  }
  for (const key of Object.keys(fields)) {
    if (!(key in entityFields)) {
      throw new ContractViolationError(`${type} has no field "${key}"`, { type, field: key });
    }
  }

  const entityAssociations: Record<string, AssociationValue> = {};
  for (const assoc of descriptor.associations) {
    const value = associations[assoc.name];
    entityAssociations[assoc.name] = value === undefined ? NOT_LOADED : value;
  }

  return {
    type,
    id,
    state: 'built',
    insertedAt: null,
    updatedAt: null,
    versionId: null,
    fields: entityFields,
    associations: entityAssociations,
  };
}

export function isLoaded(value: AssociationValue | undefined): value is Entity | Entity[] | null {
  return value !== undefined && value !== NOT_LOADED;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return typeof value === 'object' && Object.values(value).every(isJsonValue);
}

export function withFields(entity: Entity, fields: Record<string, FieldValue>): Entity {
  return { ...entity, fields: { ...entity.fields, ...fields } };
}

export function withAssociation(entity: Entity, name: string, value: AssociationValue): Entity {
  return { ...entity, associations: { ...entity.associations, [name]: value } };
}
