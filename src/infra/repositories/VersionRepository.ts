import { randomUUID } from 'node:crypto';
import type { VersionPayload, VersionRow } from '../../domain/entities/Version.js';
import { ContractViolationError } from '../../domain/errors.js';
import type { EntityDescriptor } from '../../domain/schema/EntityDescriptor.js';
import type { SchemaRegistry } from '../../domain/schema/SchemaRegistry.js';
import type { DatabaseAdapter, SqlValue } from '../DatabaseAdapter.js';
import { logger } from '../logger.js';
import type { Row } from './columns.js';
import { decodeFields, encodeFields, placeholders, stringColumn } from './columns.js';

export type HistoryOptions = {
  /** Max number of rows to return. Default: all */
  limit?: number;
};

export type Query = { sql: string; params: SqlValue[] };

/**
 * Query for every version of one entity, newest first
 */
export function historyQuery(
  descriptor: EntityDescriptor,
  entityId: string,
  options: HistoryOptions = {}
): Query {
  let sql = `
    SELECT * FROM ${descriptor.versionsTable}
    WHERE ${descriptor.referenceField} = ?
    ORDER BY inserted_at DESC
  `;
  const params: SqlValue[] = [entityId];
  if (options.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(options.limit);
  }
  return { sql, params };
}

/**
 * Repository for the append-only version tables
 * Rows are written once; nothing here updates or deletes them.
 */
export class VersionRepository {
  constructor(
    private db: DatabaseAdapter,
    private registry: SchemaRegistry
  ) {}

  insert(payload: VersionPayload): VersionRow {
    const descriptor = this.trackedDescriptor(payload.type);
    const id = randomUUID();
    const fieldColumns = descriptor.fields.map((field) => field.name);
    const columns = ['id', descriptor.referenceField, 'is_deleted', 'inserted_at', ...fieldColumns];

    const sql = `
      INSERT INTO ${descriptor.versionsTable} (${columns.join(', ')})
      VALUES (${placeholders(columns.length)})
    `;
    this.db.execute(sql, [
      id,
      payload.entityId,
      payload.isDeleted ? 1 : 0,
      payload.insertedAt,
      ...encodeFields(descriptor, payload.fields),
    ]);

    logger.debug('Version recorded', {
      type: descriptor.name,
      entityId: payload.entityId,
      versionId: id,
      isDeleted: payload.isDeleted,
    });

    return {
      type: payload.type,
      id,
      entityId: payload.entityId,
      isDeleted: payload.isDeleted,
      insertedAt: payload.insertedAt,
      fields: { ...payload.fields },
      associations: {},
    };
  }

  getById(type: string, versionId: string): VersionRow | null {
    const descriptor = this.trackedDescriptor(type);
    const row = this.db.queryOne<Row>(`SELECT * FROM ${descriptor.versionsTable} WHERE id = ?`, [versionId]);
    return row ? this.mapRowToVersion(descriptor, row) : null;
  }

  history(type: string, entityId: string, options: HistoryOptions = {}): VersionRow[] {
    const descriptor = this.trackedDescriptor(type);
    const { sql, params } = historyQuery(descriptor, entityId, options);
    return this.db.query<Row>(sql, params).map((row) => this.mapRowToVersion(descriptor, row));
  }

  /**
   * Oldest version of an entity, i.e. the one its insert wrote
   */
  first(type: string, entityId: string): VersionRow | null {
    const descriptor = this.trackedDescriptor(type);
    const sql = `
      SELECT * FROM ${descriptor.versionsTable}
      WHERE ${descriptor.referenceField} = ?
      ORDER BY inserted_at ASC
      LIMIT 1
    `;
    const row = this.db.queryOne<Row>(sql, [entityId]);
    return row ? this.mapRowToVersion(descriptor, row) : null;
  }

  /**
   * Latest version of one entity recorded at or before `at`
   */
  latestAt(type: string, entityId: string, at: string): VersionRow | null {
    const descriptor = this.trackedDescriptor(type);
    const sql = `
      SELECT * FROM ${descriptor.versionsTable}
      WHERE ${descriptor.referenceField} = ? AND inserted_at <= ?
      ORDER BY inserted_at DESC
      LIMIT 1
    `;
    const row = this.db.queryOne<Row>(sql, [entityId, at]);
    return row ? this.mapRowToVersion(descriptor, row) : null;
  }

  /**
   * Children of an owner as they stood at `at`: for every entity that ever
   * pointed at the owner through `foreignKey`, its latest version at or
   * before `at`, kept only while not deleted and still pointing at the owner.
   */
  latestManyAt(type: string, foreignKey: string, ownerId: string, at: string): VersionRow[] {
    const descriptor = this.trackedDescriptor(type);
    if (!descriptor.fields.some((field) => field.name === foreignKey)) {
      throw new ContractViolationError(`${type} has no column "${foreignKey}"`);
    }
    const ref = descriptor.referenceField;
    const table = descriptor.versionsTable;

    const sql = `
      SELECT v.* FROM ${table} v
      JOIN (
        SELECT ${ref} AS entity_id, MAX(inserted_at) AS latest_at
        FROM ${table}
        WHERE inserted_at <= ?
          AND ${ref} IN (
            SELECT DISTINCT ${ref} FROM ${table}
            WHERE ${foreignKey} = ? AND inserted_at <= ?
          )
        GROUP BY ${ref}
      ) latest ON latest.entity_id = v.${ref} AND latest.latest_at = v.inserted_at
      WHERE v.is_deleted = 0 AND v.${foreignKey} = ?
      ORDER BY v.inserted_at ASC, v.${ref} ASC
    `;
    return this.db
      .query<Row>(sql, [at, ownerId, at, ownerId])
      .map((row) => this.mapRowToVersion(descriptor, row));
  }

  private trackedDescriptor(type: string): EntityDescriptor {
    const descriptor = this.registry.get(type);
    if (!descriptor.tracked) {
      throw new ContractViolationError(`${type} is not a versioned type`, { type });
    }
    return descriptor;
  }

  private mapRowToVersion(descriptor: EntityDescriptor, row: Row): VersionRow {
    return {
      type: descriptor.name,
      id: stringColumn(row, 'id'),
      entityId: stringColumn(row, descriptor.referenceField),
      isDeleted: row.is_deleted === 1,
      insertedAt: stringColumn(row, 'inserted_at'),
      fields: decodeFields(descriptor, row),
      associations: {},
    };
  }
}
