import type { ChangeDescriptor } from '../entities/ChangeDescriptor.js';
import type { Entity } from '../entities/Entity.js';
import type { VersionPayload } from '../entities/Version.js';
import { ContractViolationError } from '../errors.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { buildVersion } from './buildVersion.js';

/**
 * Cascade-Delete Detector
 *
 * An update that drops a child from a tracked association makes storage hard
 * delete that child. Walks the change descriptor and returns one
 * deletion-marked payload per removed entity, including owned descendants of
 * removed entities. Sibling order is not meaningful.
 */
export function deletedVersions(
  registry: SchemaRegistry,
  change: ChangeDescriptor,
  options: { insertedAt: string }
): VersionPayload[] {
  const payloads: VersionPayload[] = [];
  collectRemovals(registry, change, options.insertedAt, payloads);
  return payloads;
}

function collectRemovals(
  registry: SchemaRegistry,
  change: ChangeDescriptor,
  insertedAt: string,
  payloads: VersionPayload[]
): void {
  const descriptor = registry.get(change.type);

  for (const assoc of descriptor.associations) {
    const delta = change.associations[assoc.name];
    // Untracked removals are invisible to the version trail
    if (!delta || !assoc.tracked) continue;

    if (delta.cardinality !== assoc.cardinality) {
      throw new ContractViolationError(
        `Change for ${change.type}.${assoc.name} has cardinality ${delta.cardinality}, expected ${assoc.cardinality}`
      );
    }

    if (delta.cardinality === 'one') {
      if (delta.replaced) {
        payloads.push(...removalPayloads(registry, delta.replaced, insertedAt));
      }
      if (delta.current && delta.current.action === 'update') {
        collectRemovals(registry, delta.current, insertedAt, payloads);
      }
      continue;
    }

    for (const element of delta.elements) {
      if (element.action === 'replace') {
        payloads.push(...removalPayloads(registry, element.data, insertedAt));
      } else if (element.action === 'update') {
        // Retained children may have lost children of their own
        collectRemovals(registry, element, insertedAt, payloads);
      }
    }
  }
}

function removalPayloads(registry: SchemaRegistry, removed: Entity, insertedAt: string): VersionPayload[] {
  return buildVersion(registry, removed, { deleted: true, insertedAt }).payloads;
}
