import { ConfigError, ContractViolationError } from '../errors.js';
import type {
  AssociationDefinition,
  AssociationDescriptor,
  EntityDefinition,
  EntityDescriptor,
  FieldDescriptor,
} from './EntityDescriptor.js';
import { defaultSingular } from './EntityDescriptor.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_COLUMNS = ['id', 'inserted_at', 'updated_at'];

/**
 * SchemaRegistry - maps entity type tags to their resolved descriptors
 * P5 (Separation of concerns): storage and versioning code only ever read
 * descriptors from here
 */
export class SchemaRegistry {
  private readonly descriptors: ReadonlyMap<string, EntityDescriptor>;

  constructor(definitions: readonly EntityDefinition[]) {
    this.descriptors = resolveDefinitions(definitions);
  }

  get(type: string): EntityDescriptor {
    const descriptor = this.descriptors.get(type);
    if (!descriptor) {
      throw new ContractViolationError(`Unknown entity type "${type}"`, { type });
    }
    return descriptor;
  }

  has(type: string): boolean {
    return this.descriptors.has(type);
  }

  isTracked(type: string): boolean {
    return this.descriptors.get(type)?.tracked ?? false;
  }

  all(): EntityDescriptor[] {
    return Array.from(this.descriptors.values());
  }
}

export function createSchemaRegistry(definitions: readonly EntityDefinition[]): SchemaRegistry {
  return new SchemaRegistry(definitions);
}

function resolveDefinitions(
  definitions: readonly EntityDefinition[]
): ReadonlyMap<string, EntityDescriptor> {
  const byName = new Map<string, EntityDefinition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      throw new ConfigError(`Entity type "${definition.name}" is defined twice`);
    }
    byName.set(definition.name, definition);
  }

  // First pass: own fields, including foreign keys implied by belongsTo
  const fieldsByName = new Map<string, FieldDescriptor[]>();
  for (const definition of definitions) {
    assertIdentifier(definition.table, `table of ${definition.name}`);
    const fields: FieldDescriptor[] = [];
    for (const [name, type] of Object.entries(definition.fields)) {
      assertIdentifier(name, `field ${definition.name}.${name}`);
      if (RESERVED_COLUMNS.includes(name)) {
        throw new ConfigError(`Field ${definition.name}.${name} uses a reserved column name`);
      }
      fields.push({ name, type });
    }
    for (const [name, assoc] of Object.entries(definition.associations ?? {})) {
      if (assoc.kind !== 'belongsTo') continue;
      const foreignKey = assoc.foreignKey ?? `${name}_id`;
      if (!fields.some((field) => field.name === foreignKey)) {
        assertIdentifier(foreignKey, `foreign key ${definition.name}.${foreignKey}`);
        fields.push({ name: foreignKey, type: 'string' });
      }
    }
    fieldsByName.set(definition.name, fields);
  }

  const resolved = new Map<string, EntityDescriptor>();
  for (const definition of definitions) {
    const singular = definition.singular ?? defaultSingular(definition.table);
    const referenceField = `${singular}_id`;
    assertIdentifier(referenceField, `reference field of ${definition.name}`);
    const fields = fieldsByName.get(definition.name) ?? [];
    const tracked = definition.versioned ?? true;

    if (tracked && fields.some((field) => field.name === referenceField)) {
      throw new ConfigError(
        `Field ${definition.name}.${referenceField} collides with the history-reference field`
      );
    }

    const associations = Object.entries(definition.associations ?? {}).map(([name, assoc]) =>
      resolveAssociation(definition, singular, name, assoc, byName, fieldsByName)
    );

    resolved.set(
      definition.name,
      Object.freeze({
        name: definition.name,
        table: definition.table,
        singular,
        tracked,
        versionsTable: `${definition.table}_versions`,
        referenceField,
        exposeVersionId: definition.exposeVersionId ?? false,
        fields: Object.freeze(fields),
        associations: Object.freeze(associations),
        validate: definition.validate ?? null,
      })
    );
  }

  return resolved;
}

function resolveAssociation(
  owner: EntityDefinition,
  ownerSingular: string,
  name: string,
  assoc: AssociationDefinition,
  byName: Map<string, EntityDefinition>,
  fieldsByName: Map<string, FieldDescriptor[]>
): AssociationDescriptor {
  const target = byName.get(assoc.target);
  if (!target) {
    throw new ConfigError(`Association ${owner.name}.${name} targets unknown type "${assoc.target}"`);
  }
  const targetTracked = target.versioned ?? true;
  const wantsTracking = assoc.versioned !== undefined && assoc.versioned !== false;
  if (wantsTracking && !targetTracked) {
    throw new ConfigError(
      `Association ${owner.name}.${name} is versioned but ${target.name} has no version table`
    );
  }

  if (assoc.kind === 'belongsTo') {
    const foreignKey = assoc.foreignKey ?? `${name}_id`;
    if (!wantsTracking) {
      return { cardinality: 'one', tracked: false, name, target: target.name, foreignKey };
    }
    return {
      cardinality: 'one',
      tracked: true,
      name,
      target: target.name,
      foreignKey,
      versionField: assoc.versionField ?? `${name}_version`,
    };
  }

  const foreignKey = assoc.foreignKey ?? `${ownerSingular}_id`;
  const targetFields = fieldsByName.get(target.name) ?? [];
  if (!targetFields.some((field) => field.name === foreignKey)) {
    throw new ConfigError(
      `Association ${owner.name}.${name} expects ${target.name}.${foreignKey} to exist`
    );
  }
  if (!wantsTracking) {
    return { cardinality: 'many', tracked: false, name, target: target.name, foreignKey };
  }
  return {
    cardinality: 'many',
    tracked: true,
    name,
    target: target.name,
    foreignKey,
    versionField: typeof assoc.versioned === 'string' ? assoc.versioned : `${name}_versions`,
  };
}

function assertIdentifier(value: string, label: string): void {
  if (!IDENTIFIER.test(value)) {
    throw new ConfigError(`Invalid SQL identifier for ${label}: "${value}"`);
  }
}
