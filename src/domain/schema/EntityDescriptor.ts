import type { ZodTypeAny } from 'zod';

/**
 * Entity descriptors - static metadata for one entity type
 * P4 (Explicitness): resolved once at registration, never by reflection
 */

export type FieldType = 'string' | 'integer' | 'float' | 'boolean' | 'datetime' | 'json';

export type BelongsToDefinition = {
  kind: 'belongsTo';
  target: string;
  foreignKey?: string;
  versioned?: boolean;
  versionField?: string;
};

export type HasManyDefinition = {
  kind: 'hasMany';
  target: string;
  foreignKey?: string;
  /** `true` or the name of the child-version list field */
  versioned?: boolean | string;
};

export type AssociationDefinition = BelongsToDefinition | HasManyDefinition;

export interface EntityDefinition {
  name: string;
  table: string;
  singular?: string;
  versioned?: boolean;
  exposeVersionId?: boolean;
  fields: Record<string, FieldType>;
  associations?: Record<string, AssociationDefinition>;
  validate?: ZodTypeAny;
}

export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
}

type AssociationBase = {
  readonly name: string;
  readonly target: string;
  readonly foreignKey: string;
};

export type UntrackedOneAssociation = AssociationBase & {
  readonly cardinality: 'one';
  readonly tracked: false;
};

export type TrackedOneAssociation = AssociationBase & {
  readonly cardinality: 'one';
  readonly tracked: true;
  readonly versionField: string;
};

export type UntrackedManyAssociation = AssociationBase & {
  readonly cardinality: 'many';
  readonly tracked: false;
};

export type TrackedManyAssociation = AssociationBase & {
  readonly cardinality: 'many';
  readonly tracked: true;
  readonly versionField: string;
};

export type AssociationDescriptor =
  | UntrackedOneAssociation
  | TrackedOneAssociation
  | UntrackedManyAssociation
  | TrackedManyAssociation;

export interface EntityDescriptor {
  readonly name: string;
  readonly table: string;
  readonly singular: string;
  readonly tracked: boolean;
  readonly versionsTable: string;
  /** History-reference column on the version table: `<singular>_id` */
  readonly referenceField: string;
  readonly exposeVersionId: boolean;
  readonly fields: readonly FieldDescriptor[];
  readonly associations: readonly AssociationDescriptor[];
  readonly validate: ZodTypeAny | null;
}

/**
 * Identity helper so definitions keep their literal types at the call site
 */
export function defineEntity<T extends EntityDefinition>(definition: T): T {
  return definition;
}

export function defaultSingular(table: string): string {
  return table.endsWith('s') ? table.slice(0, -1) : table;
}

export function fieldNames(descriptor: EntityDescriptor): string[] {
  return descriptor.fields.map((field) => field.name);
}

export function findAssociation(
  descriptor: EntityDescriptor,
  name: string
): AssociationDescriptor | undefined {
  return descriptor.associations.find((assoc) => assoc.name === name);
}

export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
