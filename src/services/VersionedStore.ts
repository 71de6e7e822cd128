import type { ChangeDescriptor } from '../domain/entities/ChangeDescriptor.js';
import type { Entity } from '../domain/entities/Entity.js';
import type { VersionRow } from '../domain/entities/Version.js';
import { ContractViolationError, TransactionStepError, ValidationError } from '../domain/errors.js';
import type { AssociationRequest } from '../domain/schema/associationRequest.js';
import type { SchemaRegistry } from '../domain/schema/SchemaRegistry.js';
import type { Clock } from '../infra/clock.js';
import { createMonotonicClock } from '../infra/clock.js';
import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import { logger } from '../infra/logger.js';
import { RecordRepository } from '../infra/repositories/RecordRepository.js';
import type { HistoryOptions } from '../infra/repositories/VersionRepository.js';
import { VersionRepository } from '../infra/repositories/VersionRepository.js';
import { HistoryService } from './HistoryService.js';
import { MultiResults } from './MultiResults.js';
import type { EntityInput, VersionedMulti, WriteStep } from './VersionedMulti.js';
import { SINGLE_STEP_NAMES, deleteSteps, insertSteps, updateSteps } from './VersionedMulti.js';

export interface VersionedStoreOptions {
  db: DatabaseAdapter;
  registry: SchemaRegistry;
  /** Defaults to a monotonic wall clock */
  clock?: Clock;
}

/**
 * Write Orchestrator
 * P5 (Separation of concerns): every write of a tracked entity goes through
 * here so the mutable row and its version rows commit or roll back together.
 */
export class VersionedStore {
  readonly records: RecordRepository;
  readonly versions: VersionRepository;
  private readonly historyService: HistoryService;
  private readonly registry: SchemaRegistry;
  private readonly db: DatabaseAdapter;
  private readonly clock: Clock;

  constructor(options: VersionedStoreOptions) {
    this.db = options.db;
    this.registry = options.registry;
    this.clock = options.clock ?? createMonotonicClock();
    this.records = new RecordRepository(this.db, this.registry);
    this.versions = new VersionRepository(this.db, this.registry);
    this.historyService = new HistoryService(this.registry, this.versions, this.records);
  }

  /**
   * Insert an entity (or an insert descriptor) and record its first version
   */
  insert(input: EntityInput): Entity {
    const results = this.execute(insertSteps(SINGLE_STEP_NAMES, input));
    return results.recordWithVersion(SINGLE_STEP_NAMES.record, SINGLE_STEP_NAMES.version);
  }

  /**
   * Apply an update descriptor. Writes a version only for entities whose
   * fields changed, plus deletion versions for removed children.
   */
  update(change: ChangeDescriptor): Entity {
    const results = this.execute(updateSteps(SINGLE_STEP_NAMES, change));
    return results.recordWithVersion(SINGLE_STEP_NAMES.record, SINGLE_STEP_NAMES.version);
  }

  /**
   * Hard delete the row and its owned children, recording a deletion version
   * for each tracked one
   */
  delete(input: EntityInput): Entity {
    const results = this.execute(deleteSteps(SINGLE_STEP_NAMES, input));
    return results.recordWithVersion(SINGLE_STEP_NAMES.record, SINGLE_STEP_NAMES.version);
  }

  transaction(multi: VersionedMulti): MultiResults {
    return this.execute(multi.steps());
  }

  history(type: string, entityId: string, options: HistoryOptions = {}): VersionRow[] {
    return this.historyService.history(type, entityId, options);
  }

  get(type: string, versionId: string): VersionRow | null {
    return this.historyService.get(type, versionId);
  }

  getLast(type: string, entityId: string): VersionRow | null {
    return this.historyService.getLast(type, entityId);
  }

  insertedAt(type: string, entityId: string): string | null {
    return this.historyService.insertedAt(type, entityId);
  }

  reconstructAssociations(version: VersionRow, request: AssociationRequest): VersionRow {
    return this.historyService.reconstructAssociations(version, request);
  }

  private execute(steps: readonly WriteStep[]): MultiResults {
    return this.db.transaction(() => {
      const results = new MultiResults();
      const context = {
        registry: this.registry,
        records: this.records,
        versions: this.versions,
        clock: this.clock,
        results,
      };

      for (const step of steps) {
        try {
          results.set(step.name, step.run(context));
        } catch (error) {
          throw stepFailure(step, error);
        }
      }

      logger.debug('Versioned transaction committed', { steps: results.steps() });
      return results;
    });
  }
}

/**
 * P7 (Explicit error handling): validation failures and call-site bugs keep
 * their own type, anything else names the step that failed
 */
function stepFailure(step: WriteStep, error: unknown): Error {
  if (error instanceof ValidationError && step.kind === 'record') {
    return new ValidationError(error.message, error.issues, { step: step.name });
  }
  if (error instanceof ContractViolationError || error instanceof TransactionStepError) {
    return error;
  }
  logger.warn('Versioned transaction step failed', { step: step.name, error });
  return new TransactionStepError(step.name, error);
}
