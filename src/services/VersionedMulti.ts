import type { ChangeDescriptor } from '../domain/entities/ChangeDescriptor.js';
import { change as changeOf, collectIssues } from '../domain/entities/ChangeDescriptor.js';
import type { Entity } from '../domain/entities/Entity.js';
import type { VersionPayload, VersionRow } from '../domain/entities/Version.js';
import { ContractViolationError, ValidationError } from '../domain/errors.js';
import type { SchemaRegistry } from '../domain/schema/SchemaRegistry.js';
import type { VersionBuild } from '../domain/versioning/buildVersion.js';
import { buildVersion } from '../domain/versioning/buildVersion.js';
import { deletedVersions } from '../domain/versioning/deletedVersions.js';
import type { Clock } from '../infra/clock.js';
import type { RecordRepository } from '../infra/repositories/RecordRepository.js';
import type { VersionRepository } from '../infra/repositories/VersionRepository.js';
import type { MultiResults, StepValue } from './MultiResults.js';

export type EntityInput = Entity | ChangeDescriptor;

/** A value, or a function of the results of the steps before it */
export type Resolvable<T> = T | ((results: MultiResults) => T);

export type StepKind = StepValue['kind'];

export interface StepContext {
  registry: SchemaRegistry;
  records: RecordRepository;
  versions: VersionRepository;
  clock: Clock;
  results: MultiResults;
}

export interface WriteStep {
  name: string;
  kind: StepKind;
  run(context: StepContext): StepValue;
}

export interface StepNames {
  record: string;
  version: string;
  deletes: string;
}

/**
 * Composable versioned transaction. Each operation contributes named steps
 * (`<name>_record`, `<name>_version` and for updates `<name>_deletes`);
 * later steps can read earlier results.
 *
 * Nothing runs until the multi is handed to `VersionedStore.transaction`.
 */
export class VersionedMulti {
  private readonly entries: WriteStep[] = [];

  insert(name: string, input: Resolvable<EntityInput>): this {
    return this.add(insertSteps(prefixed(name), input));
  }

  update(name: string, input: Resolvable<ChangeDescriptor>): this {
    return this.add(updateSteps(prefixed(name), input));
  }

  delete(name: string, input: Resolvable<EntityInput>): this {
    return this.add(deleteSteps(prefixed(name), input));
  }

  /**
   * Arbitrary step inside the same transaction; a throw rolls back everything
   */
  run(name: string, fn: (results: MultiResults, context: StepContext) => unknown): this {
    return this.add([
      { name, kind: 'custom', run: (context) => ({ kind: 'custom', value: fn(context.results, context) }) },
    ]);
  }

  steps(): readonly WriteStep[] {
    return this.entries;
  }

  private add(steps: WriteStep[]): this {
    for (const step of steps) {
      if (this.entries.some((existing) => existing.name === step.name)) {
        throw new ContractViolationError(`Step "${step.name}" is already part of this transaction`);
      }
      this.entries.push(step);
    }
    return this;
  }
}

export const SINGLE_STEP_NAMES: StepNames = { record: 'record', version: 'version', deletes: 'deletes' };

function prefixed(name: string): StepNames {
  return { record: `${name}_record`, version: `${name}_version`, deletes: `${name}_deletes` };
}

export function insertSteps(names: StepNames, input: Resolvable<EntityInput>): WriteStep[] {
  const stamp = operationStamp();
  return [
    {
      name: names.record,
      kind: 'record',
      run: (context) => {
        const resolved = resolve(input, context.results);
        const change = isChangeDescriptor(resolved) ? resolved : changeOf(context.registry, resolved);
        if (change.action !== 'insert') {
          throw new ContractViolationError(`Cannot insert ${change.type} ${change.data.id}: it is already persisted`);
        }
        ensureValid(change);
        const entity = context.records.insert(change, stamp(context));
        return recordValue(context, entity, change);
      },
    },
    versionStep(names, stamp),
  ];
}

export function updateSteps(names: StepNames, input: Resolvable<ChangeDescriptor>): WriteStep[] {
  const stamp = operationStamp();
  return [
    {
      name: names.record,
      kind: 'record',
      run: (context) => {
        const resolved = resolve(input, context.results);
        if (resolved.action !== 'update') {
          throw new ContractViolationError(`Expected an update of ${resolved.type}, got ${resolved.action}`);
        }
        ensureValid(resolved);
        // Removed children must be read before storage deletes them
        const change = loadRemovals(context, resolved);
        const entity = context.records.update(change, stamp(context));
        return recordValue(context, entity, change);
      },
    },
    versionStep(names, stamp),
    {
      name: names.deletes,
      kind: 'deletes',
      run: (context) => {
        const change = context.results.recordChange(names.record);
        if (!change) {
          return { kind: 'deletes', rows: [] };
        }
        const payloads = deletedVersions(context.registry, change, { insertedAt: stamp(context) });
        return { kind: 'deletes', rows: payloads.map((payload) => context.versions.insert(payload)) };
      },
    },
  ];
}

export function deleteSteps(names: StepNames, input: Resolvable<EntityInput>): WriteStep[] {
  const stamp = operationStamp();
  return [
    {
      name: names.record,
      kind: 'record',
      run: (context) => {
        const resolved = resolve(input, context.results);
        const entity = isChangeDescriptor(resolved) ? resolved.data : resolved;
        if (entity.state !== 'loaded') {
          throw new ContractViolationError(`Cannot delete ${entity.type} ${entity.id} in state ${entity.state}`);
        }
        const graph = context.records.loadOwnedGraph(entity);
        return recordValue(context, context.records.delete(graph), null);
      },
    },
    versionStep(names, stamp),
  ];
}

function versionStep(names: StepNames, stamp: (context: StepContext) => string): WriteStep {
  return {
    name: names.version,
    kind: 'version',
    run: (context) => {
      const entity = context.results.record(names.record);
      const change = context.results.recordChange(names.record);
      const build = buildVersion(context.registry, entity, {
        insertedAt: stamp(context),
        deleted: entity.state === 'deleted',
        change: change ?? undefined,
      });
      return { kind: 'version', ...writeBuild(context.versions, build) };
    },
  };
}

/**
 * Writes every payload and rebuilds the root's tree from the stored rows
 */
function writeBuild(versions: VersionRepository, build: VersionBuild): { root: VersionRow | null; rows: VersionRow[] } {
  const written = new Map<VersionPayload, VersionRow>();
  const rows = build.payloads.map((payload) => {
    const row = versions.insert(payload);
    written.set(payload, row);
    return row;
  });

  const toRow = (payload: VersionPayload): VersionRow => {
    const row = written.get(payload);
    if (!row) {
      throw new ContractViolationError(`Version of ${payload.type} ${payload.entityId} was never written`);
    }
    const associations: VersionRow['associations'] = { ...payload.references };
    for (const [field, child] of Object.entries(payload.children)) {
      associations[field] = Array.isArray(child) ? child.map(toRow) : toRow(child);
    }
    return { ...row, associations };
  };

  return { root: build.root ? toRow(build.root) : null, rows };
}

/**
 * One timestamp per operation, drawn the first time a step asks for it
 */
function operationStamp(): (context: StepContext) => string {
  let stamp: string | null = null;
  return (context) => {
    if (stamp === null) {
      stamp = context.clock().toISOString();
    }
    return stamp;
  };
}

function recordValue(context: StepContext, entity: Entity, change: ChangeDescriptor | null): StepValue {
  return {
    kind: 'record',
    entity,
    change,
    exposeVersionId: context.registry.get(entity.type).exposeVersionId,
  };
}

function ensureValid(change: ChangeDescriptor): void {
  const issues = collectIssues(change);
  if (issues.length > 0) {
    throw new ValidationError(`Invalid ${change.type}`, issues, { type: change.type, id: change.data.id });
  }
}

/**
 * Replaces every removed tracked entity in the descriptor with its full owned
 * graph so its descendants get deletion versions as well
 */
function loadRemovals(context: StepContext, change: ChangeDescriptor): ChangeDescriptor {
  const descriptor = context.registry.get(change.type);
  const associations = { ...change.associations };

  for (const assoc of descriptor.associations) {
    const delta = associations[assoc.name];
    if (!delta || !assoc.tracked) continue;

    if (delta.cardinality === 'one') {
      associations[assoc.name] = {
        cardinality: 'one',
        current: delta.current && delta.current.action === 'update' ? loadRemovals(context, delta.current) : delta.current,
        replaced: delta.replaced ? context.records.loadOwnedGraph(delta.replaced) : null,
      };
      continue;
    }

    associations[assoc.name] = {
      cardinality: 'many',
      elements: delta.elements.map((element) => {
        switch (element.action) {
          case 'replace':
            return { ...element, data: context.records.loadOwnedGraph(element.data) };
          case 'update':
            return loadRemovals(context, element);
          case 'insert':
            return element;
        }
      }),
    };
  }

  return { ...change, associations };
}

function resolve<T>(input: Resolvable<T>, results: MultiResults): T {
  return isResolver(input) ? input(results) : input;
}

function isResolver<T>(input: Resolvable<T>): input is (results: MultiResults) => T {
  return typeof input === 'function';
}

export function isChangeDescriptor(value: EntityInput): value is ChangeDescriptor {
  return 'action' in value && 'data' in value;
}

