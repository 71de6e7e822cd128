import { randomUUID } from 'node:crypto';
import { ContractViolationError } from '../errors.js';
import type { ValidationIssue } from '../errors.js';
import type {
  AssociationDescriptor,
  EntityDescriptor,
  FieldType,
} from '../schema/EntityDescriptor.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { AssociationValue, Entity, FieldValue } from './Entity.js';
import { NOT_LOADED, buildEntity, isJsonValue } from './Entity.js';

/**
 * Change descriptors - what an insert or update is about to do to an entity
 * graph. Used to persist the mutation, to suppress no-op versions and to find
 * children removed by an update.
 */

export type ChangeAction = 'insert' | 'update' | 'replace';

export type OneDelta = {
  cardinality: 'one';
  current: ChangeDescriptor | null;
  /** Previous target being swapped out or cleared */
  replaced: Entity | null;
};

export type ManyDelta = {
  cardinality: 'many';
  /** Removed children carry action `replace` */
  elements: ChangeDescriptor[];
};

export type AssociationDelta = OneDelta | ManyDelta;

export interface ChangeDescriptor {
  type: string;
  action: ChangeAction;
  /** State before the change; for inserts the unsaved entity */
  data: Entity;
  changes: Record<string, FieldValue>;
  associations: Record<string, AssociationDelta>;
  errors: ValidationIssue[];
}

export type EntityParams = Readonly<Record<string, unknown>>;

export function hasFieldChanges(change: ChangeDescriptor): boolean {
  return change.action === 'insert' || Object.keys(change.changes).length > 0;
}

/**
 * Descriptor without validation. A built entity becomes an insert of itself
 * and every loaded nested association; a persisted one an update of `fields`.
 */
export function change(
  registry: SchemaRegistry,
  entity: Entity,
  fields: Record<string, FieldValue> = {}
): ChangeDescriptor {
  const descriptor = registry.get(entity.type);
  for (const key of Object.keys(fields)) {
    if (!descriptor.fields.some((field) => field.name === key)) {
      throw new ContractViolationError(`${entity.type} has no field "${key}"`, {
        type: entity.type,
        field: key,
      });
    }
  }

  switch (entity.state) {
    case 'built':
      return insertDescriptor(registry, {
        ...entity,
        fields: { ...entity.fields, ...fields },
      });
    case 'loaded': {
      const changes: Record<string, FieldValue> = {};
      for (const [key, value] of Object.entries(fields)) {
        if (!sameValue(entity.fields[key] ?? null, value)) {
          changes[key] = value;
        }
      }
      return { type: entity.type, action: 'update', data: entity, changes, associations: {}, errors: [] };
    }
    case 'deleted':
      throw new ContractViolationError(`Cannot change deleted ${entity.type} ${entity.id}`);
  }
}

/**
 * Descriptor from plain params, validated with the type's zod schema. Nested
 * association params are diffed by id against the loaded children.
 */
export function cast(
  registry: SchemaRegistry,
  entity: Entity,
  params: EntityParams
): ChangeDescriptor {
  const descriptor = registry.get(entity.type);
  const result: ChangeDescriptor =
    entity.state === 'built' ? insertDescriptor(registry, entity) : change(registry, entity);

  for (const [key, value] of Object.entries(params)) {
    if (key === 'id' || value === undefined) continue;

    const field = descriptor.fields.find((candidate) => candidate.name === key);
    if (field) {
      if (!matchesFieldType(field.type, value)) {
        result.errors.push({ path: key, message: `must be a ${field.type}` });
      } else if (result.action === 'insert') {
        if (value === null) {
          delete result.changes[key];
        } else {
          result.changes[key] = value;
        }
      } else if (!sameValue(entity.fields[key] ?? null, value)) {
        result.changes[key] = value;
      }
      continue;
    }

    const assoc = descriptor.associations.find((candidate) => candidate.name === key);
    if (assoc) {
      castAssociation(registry, result, assoc, value);
      continue;
    }

    result.errors.push({ path: key, message: 'is not a known field' });
  }

  runValidator(descriptor, result);
  return result;
}

export function collectIssues(change: ChangeDescriptor, prefix = ''): ValidationIssue[] {
  const issues = change.errors.map((issue) => ({ path: `${prefix}${issue.path}`, message: issue.message }));

  for (const [name, delta] of Object.entries(change.associations)) {
    if (delta.cardinality === 'one') {
      if (delta.current) {
        issues.push(...collectIssues(delta.current, `${prefix}${name}.`));
      }
    } else {
      delta.elements.forEach((element, index) => {
        issues.push(...collectIssues(element, `${prefix}${name}[${index}].`));
      });
    }
  }

  return issues;
}

export function isValid(change: ChangeDescriptor): boolean {
  return collectIssues(change).length === 0;
}

/**
 * Post-mutation view of the root entity's own fields
 */
export function applyChanges(change: ChangeDescriptor): Record<string, FieldValue> {
  return { ...change.data.fields, ...change.changes };
}

function insertDescriptor(registry: SchemaRegistry, entity: Entity): ChangeDescriptor {
  const descriptor = registry.get(entity.type);
  const changes: Record<string, FieldValue> = {};
  for (const field of descriptor.fields) {
    const value = entity.fields[field.name] ?? null;
    if (value !== null) {
      changes[field.name] = value;
    }
  }

  const associations: Record<string, AssociationDelta> = {};
  for (const assoc of descriptor.associations) {
    const value = entity.associations[assoc.name];
    if (value === undefined || value === NOT_LOADED || value === null) continue;

    if (assoc.cardinality === 'one') {
      const child = expectOne(assoc, value, entity);
      if (child.state === 'built') {
        associations[assoc.name] = {
          cardinality: 'one',
          current: insertDescriptor(registry, child),
          replaced: null,
        };
      }
      changes[assoc.foreignKey] = child.id;
    } else {
      const children = expectMany(assoc, value, entity);
      associations[assoc.name] = {
        cardinality: 'many',
        elements: children.map((child) =>
          child.state === 'built'
            ? insertDescriptor(registry, child)
            : change(registry, child, { [assoc.foreignKey]: entity.id })
        ),
      };
    }
  }

  return { type: entity.type, action: 'insert', data: entity, changes, associations, errors: [] };
}

function castAssociation(
  registry: SchemaRegistry,
  owner: ChangeDescriptor,
  assoc: AssociationDescriptor,
  value: unknown
): void {
  const current = owner.data.associations[assoc.name];
  if (current === NOT_LOADED && owner.action !== 'insert') {
    throw new ContractViolationError(
      `Association ${owner.type}.${assoc.name} must be loaded before casting it`,
      { type: owner.type, id: owner.data.id, association: assoc.name }
    );
  }

  if (assoc.cardinality === 'one') {
    const existing =
      current === undefined || current === NOT_LOADED || current === null
        ? null
        : expectOne(assoc, current, owner.data);

    if (value === null) {
      if (existing) {
        owner.associations[assoc.name] = { cardinality: 'one', current: null, replaced: existing };
        owner.changes[assoc.foreignKey] = null;
      }
      return;
    }
    if (!isParams(value)) {
      owner.errors.push({ path: assoc.name, message: 'is invalid' });
      return;
    }

    if (existing && value.id === existing.id) {
      const updated = cast(registry, existing, value);
      owner.associations[assoc.name] = { cardinality: 'one', current: updated, replaced: null };
      return;
    }

    const inserted = cast(registry, buildChild(registry, assoc, value), value);
    owner.associations[assoc.name] = { cardinality: 'one', current: inserted, replaced: existing };
    owner.changes[assoc.foreignKey] = inserted.data.id;
    return;
  }

  if (!Array.isArray(value)) {
    owner.errors.push({ path: assoc.name, message: 'must be a list' });
    return;
  }

  const existing = current === undefined || current === NOT_LOADED ? [] : expectMany(assoc, current, owner.data);
  const matched = new Set<string>();
  const elements: ChangeDescriptor[] = [];

  value.forEach((item: unknown, index) => {
    if (!isParams(item)) {
      owner.errors.push({ path: `${assoc.name}[${index}]`, message: 'is invalid' });
      return;
    }
    const match = existing.find((child) => child.id === item.id);
    if (match) {
      matched.add(match.id);
      elements.push(cast(registry, match, item));
    } else {
      const child = buildChild(registry, assoc, item);
      elements.push(cast(registry, child, { ...item, [assoc.foreignKey]: owner.data.id }));
    }
  });

  for (const child of existing) {
    if (!matched.has(child.id)) {
      elements.push({ type: child.type, action: 'replace', data: child, changes: {}, associations: {}, errors: [] });
    }
  }

  owner.associations[assoc.name] = { cardinality: 'many', elements };
}

function buildChild(registry: SchemaRegistry, assoc: AssociationDescriptor, params: EntityParams): Entity {
  const id = typeof params.id === 'string' ? params.id : randomUUID();
  return buildEntity(registry, assoc.target, {}, {}, id);
}

function runValidator(descriptor: EntityDescriptor, change: ChangeDescriptor): void {
  if (!descriptor.validate) return;

  const result = descriptor.validate.safeParse(applyChanges(change));
  if (!result.success) {
    for (const issue of result.error.issues) {
      change.errors.push({
        path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message,
      });
    }
  }
}

export function expectOne(assoc: AssociationDescriptor, value: AssociationValue, owner: Entity): Entity {
  if (value === NOT_LOADED || value === null || Array.isArray(value) || value.type !== assoc.target) {
    throw new ContractViolationError(
      `Association ${owner.type}.${assoc.name} must hold a single ${assoc.target}`,
      { type: owner.type, id: owner.id, association: assoc.name }
    );
  }
  return value;
}

export function expectMany(assoc: AssociationDescriptor, value: AssociationValue, owner: Entity): Entity[] {
  if (!Array.isArray(value) || value.some((child) => child.type !== assoc.target)) {
    throw new ContractViolationError(
      `Association ${owner.type}.${assoc.name} must hold a list of ${assoc.target}`,
      { type: owner.type, id: owner.id, association: assoc.name }
    );
  }
  return value;
}

function isParams(value: unknown): value is EntityParams {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matchesFieldType(type: FieldType, value: unknown): value is FieldValue {
  if (value === null) return true;
  switch (type) {
    case 'string':
    case 'datetime':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'json':
      return isJsonValue(value);
  }
}

export function sameValue(a: FieldValue, b: FieldValue): boolean {
  if (a === b) return true;
  if (typeof a === 'object' && typeof b === 'object') {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return false;
}
