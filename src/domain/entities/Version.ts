import type { Entity, FieldValue } from './Entity.js';

/**
 * Version - immutable, append-only snapshot of an entity at one moment
 * P1 (Single Responsibility): version rows are written once and never updated
 */

/** A version row that has not been written yet, as produced by the builder */
export interface VersionPayload {
  type: string;
  entityId: string;
  isDeleted: boolean;
  insertedAt: string;
  fields: Record<string, FieldValue>;
  /** Tracked associations, keyed by the association's version field */
  children: Record<string, VersionPayload | VersionPayload[]>;
  /** Untracked associations, carried through by reference */
  references: Record<string, Entity | Entity[] | null>;
}

export type VersionAssociation = VersionRow | VersionRow[] | Entity | Entity[] | null;

export interface VersionRow {
  type: string;
  id: string;
  /** Value of the `<singular>_id` history-reference column */
  entityId: string;
  isDeleted: boolean;
  insertedAt: string;
  fields: Record<string, FieldValue>;
  /** Populated at read time only, never stored */
  associations: Record<string, VersionAssociation>;
}

export function createVersionPayload(params: {
  type: string;
  entityId: string;
  isDeleted: boolean;
  insertedAt: string;
  fields: Record<string, FieldValue>;
}): VersionPayload {
  return {
    type: params.type,
    entityId: params.entityId,
    isDeleted: params.isDeleted,
    insertedAt: params.insertedAt,
    fields: { ...params.fields },
    children: {},
    references: {},
  };
}
