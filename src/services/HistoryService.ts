import type { Entity } from '../domain/entities/Entity.js';
import type { VersionAssociation, VersionRow } from '../domain/entities/Version.js';
import type { AssociationRequest, RequestTree } from '../domain/schema/associationRequest.js';
import { normalizeRequest, unknownAssociation } from '../domain/schema/associationRequest.js';
import { assertNever, findAssociation } from '../domain/schema/EntityDescriptor.js';
import type { SchemaRegistry } from '../domain/schema/SchemaRegistry.js';
import type { RecordRepository } from '../infra/repositories/RecordRepository.js';
import type { HistoryOptions, VersionRepository } from '../infra/repositories/VersionRepository.js';
import { logger } from '../infra/logger.js';

/**
 * History Query Engine
 * Read-only: lists versions and rebuilds a version's associated graph as it
 * stood at that version's timestamp.
 */
export class HistoryService {
  constructor(
    private registry: SchemaRegistry,
    private versions: VersionRepository,
    private records: RecordRepository
  ) {}

  /**
   * Every version of an entity, newest first
   */
  history(type: string, entityId: string, options: HistoryOptions = {}): VersionRow[] {
    return this.versions.history(type, entityId, options);
  }

  get(type: string, versionId: string): VersionRow | null {
    return this.versions.getById(type, versionId);
  }

  getLast(type: string, entityId: string): VersionRow | null {
    return this.versions.history(type, entityId, { limit: 1 })[0] ?? null;
  }

  /**
   * When the entity was first recorded, null if it never was
   */
  insertedAt(type: string, entityId: string): string | null {
    return this.versions.first(type, entityId)?.insertedAt ?? null;
  }

  /**
   * Attach the requested associations as they were at `version.insertedAt`.
   * Tracked ones land under their version field (`car_version`,
   * `fancy_hobby_versions`), untracked ones under the association name with
   * their current state.
   */
  reconstructAssociations(version: VersionRow, request: AssociationRequest): VersionRow {
    const tree = normalizeRequest(request);
    logger.debug('Reconstructing version associations', {
      type: version.type,
      versionId: version.id,
      associations: Array.from(tree.keys()),
    });
    return this.reconstruct(version, tree);
  }

  private reconstruct(version: VersionRow, tree: RequestTree): VersionRow {
    const descriptor = this.registry.get(version.type);
    const associations: Record<string, VersionAssociation> = { ...version.associations };

    for (const [name, nested] of tree) {
      const assoc = findAssociation(descriptor, name);
      if (!assoc) {
        throw unknownAssociation(version.type, name);
      }

      switch (assoc.cardinality) {
        case 'one': {
          const targetId = version.fields[assoc.foreignKey];
          if (!assoc.tracked) {
            associations[assoc.name] =
              typeof targetId === 'string' ? this.currentOne(assoc.target, targetId, nested) : null;
            break;
          }
          const target =
            typeof targetId === 'string' ? this.versions.latestAt(assoc.target, targetId, version.insertedAt) : null;
          associations[assoc.versionField] = target ? this.reconstruct(target, nested) : null;
          break;
        }

        case 'many': {
          if (!assoc.tracked) {
            associations[assoc.name] = this.currentMany(assoc.target, assoc.foreignKey, version.entityId, nested);
            break;
          }
          associations[assoc.versionField] = this.versions
            .latestManyAt(assoc.target, assoc.foreignKey, version.entityId, version.insertedAt)
            .map((child) => this.reconstruct(child, nested));
          break;
        }

        default:
          assertNever(assoc, 'association');
      }
    }

    return { ...version, associations };
  }

  // Untracked targets have no history; their current rows stand in
  private currentOne(type: string, id: string, nested: RequestTree): Entity | null {
    return this.records.getById(type, id, treeToRequest(nested));
  }

  private currentMany(type: string, foreignKey: string, ownerId: string, nested: RequestTree): Entity[] {
    const request = treeToRequest(nested);
    return this.records
      .list(type, { where: { [foreignKey]: ownerId } })
      .map((entity) => this.records.preload(entity, request));
  }
}

function treeToRequest(tree: RequestTree): AssociationRequest {
  const request: Record<string, AssociationRequest> = {};
  for (const [name, nested] of tree) {
    request[name] = treeToRequest(nested);
  }
  return request;
}
