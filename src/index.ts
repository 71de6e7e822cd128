export * from './domain/errors.js';
export * from './domain/schema/EntityDescriptor.js';
export * from './domain/schema/SchemaRegistry.js';
export type { AssociationRequest } from './domain/schema/associationRequest.js';
export * from './domain/entities/Entity.js';
export * from './domain/entities/Version.js';
export {
  applyChanges,
  cast,
  change,
  collectIssues,
  hasFieldChanges,
  isValid,
} from './domain/entities/ChangeDescriptor.js';
export type {
  AssociationDelta,
  ChangeAction,
  ChangeDescriptor,
  EntityParams,
  ManyDelta,
  OneDelta,
} from './domain/entities/ChangeDescriptor.js';
export { buildVersion } from './domain/versioning/buildVersion.js';
export type { BuildVersionOptions, VersionBuild } from './domain/versioning/buildVersion.js';
export { deletedVersions } from './domain/versioning/deletedVersions.js';

export { DatabaseAdapter } from './infra/DatabaseAdapter.js';
export { createMonotonicClock } from './infra/clock.js';
export type { Clock } from './infra/clock.js';
export { validateEnv } from './infra/env.js';
export type { Env } from './infra/env.js';
export { createLogger, logger, setLogger } from './infra/logger.js';
export * from './infra/migrations.js';
export { RecordRepository } from './infra/repositories/RecordRepository.js';
export type { ListOptions } from './infra/repositories/RecordRepository.js';
export { VersionRepository } from './infra/repositories/VersionRepository.js';
export type { HistoryOptions } from './infra/repositories/VersionRepository.js';

export { HistoryService } from './services/HistoryService.js';
export { MultiResults, addVersionToRecord } from './services/MultiResults.js';
export type { StepValue } from './services/MultiResults.js';
export { VersionedMulti } from './services/VersionedMulti.js';
export type { EntityInput, Resolvable, StepContext } from './services/VersionedMulti.js';
export { VersionedStore } from './services/VersionedStore.js';
export type { VersionedStoreOptions } from './services/VersionedStore.js';
