import type { ChangeDescriptor } from '../entities/ChangeDescriptor.js';
import { expectMany, expectOne, hasFieldChanges } from '../entities/ChangeDescriptor.js';
import type { Entity, FieldValue } from '../entities/Entity.js';
import { NOT_LOADED } from '../entities/Entity.js';
import type { VersionPayload } from '../entities/Version.js';
import { createVersionPayload } from '../entities/Version.js';
import { assertNever } from '../schema/EntityDescriptor.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';

export interface BuildVersionOptions {
  /** Shared by every row one logical operation writes */
  insertedAt: string;
  deleted?: boolean;
  /** When given, entities without field changes produce no payload */
  change?: ChangeDescriptor;
}

export interface VersionBuild {
  /** Payload tree of the entity itself, null when untracked or unchanged */
  root: VersionPayload | null;
  /** Every payload to write, parents before their descendants */
  payloads: VersionPayload[];
}

type BuildMode =
  | { kind: 'full'; deleted: boolean }
  | { kind: 'diff'; change: ChangeDescriptor };

/**
 * Version Builder
 * Pure: derives the version rows for an entity graph, performs no I/O.
 *
 * Unchanged entities are skipped independently at every depth, so a changed
 * child of an unchanged parent still shows up in `payloads` (just not under
 * `root`). On the deletion path owned hasMany children are marked deleted
 * too while belongsTo targets, which outlive the owner, are left alone.
 */
export function buildVersion(
  registry: SchemaRegistry,
  entity: Entity,
  options: BuildVersionOptions
): VersionBuild {
  const mode: BuildMode =
    options.change && !options.deleted
      ? { kind: 'diff', change: options.change }
      : { kind: 'full', deleted: options.deleted ?? false };

  const payloads: VersionPayload[] = [];
  const root = visit(registry, entity, mode, options.insertedAt, payloads);
  return { root, payloads };
}

function visit(
  registry: SchemaRegistry,
  entity: Entity,
  mode: BuildMode,
  insertedAt: string,
  payloads: VersionPayload[]
): VersionPayload | null {
  const descriptor = registry.get(entity.type);
  if (!descriptor.tracked) {
    return null;
  }

  const deleted = mode.kind === 'full' && mode.deleted;
  const unchanged = mode.kind === 'diff' && !hasFieldChanges(mode.change);

  let payload: VersionPayload | null = null;
  if (!unchanged) {
    const fields: Record<string, FieldValue> = {};
    for (const field of descriptor.fields) {
      fields[field.name] = entity.fields[field.name] ?? null;
    }
    payload = createVersionPayload({
      type: entity.type,
      entityId: entity.id,
      isDeleted: deleted,
      insertedAt,
      fields,
    });
    payloads.push(payload);
  }

  for (const assoc of descriptor.associations) {
    const value = entity.associations[assoc.name];
    if (value === undefined || value === NOT_LOADED) continue;

    switch (assoc.cardinality) {
      case 'one': {
        if (!assoc.tracked) {
          if (payload) {
            payload.references[assoc.name] = value === null ? null : expectOne(assoc, value, entity);
          }
          break;
        }
        if (deleted || value === null) break;

        const child = expectOne(assoc, value, entity);
        const childMode = modeForChild(mode, assoc.name, child);
        if (!childMode) break;

        const built = visit(registry, child, childMode, insertedAt, payloads);
        if (payload && built) {
          payload.children[assoc.versionField] = built;
        }
        break;
      }

      case 'many': {
        const children = expectMany(assoc, value, entity);
        if (!assoc.tracked) {
          if (payload) {
            payload.references[assoc.name] = children;
          }
          break;
        }

        const built: VersionPayload[] = [];
        for (const child of children) {
          const childMode = modeForChild(mode, assoc.name, child);
          if (!childMode) continue;
          const childPayload = visit(registry, child, childMode, insertedAt, payloads);
          if (childPayload) {
            built.push(childPayload);
          }
        }
        if (payload) {
          payload.children[assoc.versionField] = built;
        }
        break;
      }

      default:
        assertNever(assoc, 'association');
    }
  }

  return payload;
}

// null means the child is known to be untouched by this change
function modeForChild(mode: BuildMode, association: string, child: Entity): BuildMode | null {
  if (mode.kind === 'full') {
    return mode;
  }

  const delta = mode.change.associations[association];
  if (!delta) {
    return null;
  }

  if (delta.cardinality === 'one') {
    return delta.current && delta.current.data.id === child.id
      ? { kind: 'diff', change: delta.current }
      : null;
  }

  const element = delta.elements.find(
    (candidate) => candidate.action !== 'replace' && candidate.data.id === child.id
  );
  return element ? { kind: 'diff', change: element } : null;
}
