import type { ChangeDescriptor } from '../domain/entities/ChangeDescriptor.js';
import type { Entity } from '../domain/entities/Entity.js';
import type { VersionRow } from '../domain/entities/Version.js';
import { ContractViolationError } from '../domain/errors.js';

export type StepValue =
  | { kind: 'record'; entity: Entity; change: ChangeDescriptor | null; exposeVersionId: boolean }
  | { kind: 'version'; root: VersionRow | null; rows: VersionRow[] }
  | { kind: 'deletes'; rows: VersionRow[] }
  | { kind: 'custom'; value: unknown };

/**
 * Results of a versioned transaction, keyed by step name
 * (`<name>_record`, `<name>_version`, `<name>_deletes`).
 */
export class MultiResults {
  private readonly values = new Map<string, StepValue>();

  set(step: string, value: StepValue): void {
    this.values.set(step, value);
  }

  get(step: string): StepValue | undefined {
    return this.values.get(step);
  }

  steps(): string[] {
    return Array.from(this.values.keys());
  }

  record(step: string): Entity {
    return this.recordValue(step).entity;
  }

  recordChange(step: string): ChangeDescriptor | null {
    return this.recordValue(step).change;
  }

  /** Root version row written by the step, null when nothing changed */
  version(step: string): VersionRow | null {
    const value = this.values.get(step);
    if (value?.kind !== 'version') {
      throw missingStep(step, 'version');
    }
    return value.root;
  }

  /** Every version row written by the step, root first */
  versionRows(step: string): VersionRow[] {
    const value = this.values.get(step);
    if (value?.kind !== 'version') {
      throw missingStep(step, 'version');
    }
    return value.rows;
  }

  deletes(step: string): VersionRow[] {
    const value = this.values.get(step);
    if (value?.kind !== 'deletes') {
      throw missingStep(step, 'deletes');
    }
    return value.rows;
  }

  value(step: string): unknown {
    const value = this.values.get(step);
    if (value?.kind !== 'custom') {
      throw missingStep(step, 'custom');
    }
    return value.value;
  }

  /**
   * The record of `recordStep`, with `versionId` set from `versionStep` when
   * its type exposes it and a version was written
   */
  recordWithVersion(recordStep: string, versionStep: string): Entity {
    const { entity, exposeVersionId } = this.recordValue(recordStep);
    const version = this.values.get(versionStep);
    if (!exposeVersionId || version?.kind !== 'version' || !version.root) {
      return entity;
    }
    return { ...entity, versionId: version.root.id };
  }

  private recordValue(step: string): Extract<StepValue, { kind: 'record' }> {
    const value = this.values.get(step);
    if (value?.kind !== 'record') {
      throw missingStep(step, 'record');
    }
    return value;
  }
}

/**
 * Populate `versionId` of the `<name>_record` result from `<name>_version`
 */
export function addVersionToRecord(results: MultiResults, name: string): Entity {
  return results.recordWithVersion(`${name}_record`, `${name}_version`);
}

function missingStep(step: string, kind: string): ContractViolationError {
  return new ContractViolationError(`No ${kind} result for step "${step}"`, { step });
}
