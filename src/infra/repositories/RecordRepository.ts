import type { ChangeDescriptor } from '../../domain/entities/ChangeDescriptor.js';
import { applyChanges, expectMany } from '../../domain/entities/ChangeDescriptor.js';
import type { AssociationValue, Entity, FieldValue } from '../../domain/entities/Entity.js';
import { NOT_LOADED, withAssociation } from '../../domain/entities/Entity.js';
import { ContractViolationError, NotFoundError } from '../../domain/errors.js';
import type { AssociationRequest, RequestTree } from '../../domain/schema/associationRequest.js';
import { normalizeRequest, unknownAssociation } from '../../domain/schema/associationRequest.js';
import type { EntityDescriptor } from '../../domain/schema/EntityDescriptor.js';
import { findAssociation } from '../../domain/schema/EntityDescriptor.js';
import type { SchemaRegistry } from '../../domain/schema/SchemaRegistry.js';
import type { DatabaseAdapter, SqlValue } from '../DatabaseAdapter.js';
import { logger } from '../logger.js';
import type { Row } from './columns.js';
import { decodeFields, encodeField, encodeFields, placeholders, stringColumn } from './columns.js';

const ROW_COLUMNS = ['id', 'inserted_at', 'updated_at'];

export type ListOptions = {
  where?: Record<string, FieldValue>;
  orderBy?: { column: string; direction?: 'asc' | 'desc' };
  limit?: number;
};

/**
 * Repository for the mutable tables
 * P5 (Separation of concerns): knows rows and nested writes, nothing about versions
 *
 * A hasMany child is owned by its parent: removing the parent, directly or by
 * replacing it in an update, removes the child rows as well.
 */
export class RecordRepository {
  constructor(
    private db: DatabaseAdapter,
    private registry: SchemaRegistry
  ) {}

  insert(change: ChangeDescriptor, now: string): Entity {
    if (change.action !== 'insert') {
      throw new ContractViolationError(`Expected an insert for ${change.type}, got ${change.action}`);
    }
    const descriptor = this.registry.get(change.type);
    const fields = applyChanges(change);
    let associations: Record<string, AssociationValue> = { ...change.data.associations };

    for (const assoc of descriptor.associations) {
      const delta = change.associations[assoc.name];
      if (!delta || delta.cardinality !== 'one' || assoc.cardinality !== 'one') continue;
      const target = delta.current ? this.persist(delta.current, now) : null;
      fields[assoc.foreignKey] = target ? target.id : null;
      associations[assoc.name] = target;
    }

    const columns = ['id', 'inserted_at', 'updated_at', ...descriptor.fields.map((field) => field.name)];
    const sql = `
      INSERT INTO ${descriptor.table} (${columns.join(', ')})
      VALUES (${placeholders(columns.length)})
    `;
    this.db.execute(sql, [change.data.id, now, now, ...encodeFields(descriptor, fields)]);
    logger.debug('Record inserted', { type: descriptor.name, id: change.data.id });

    associations = this.persistChildren(descriptor, change, change.data.id, associations, now);

    return {
      type: change.type,
      id: change.data.id,
      state: 'loaded',
      insertedAt: now,
      updatedAt: now,
      versionId: change.data.versionId,
      fields,
      associations,
    };
  }

  update(change: ChangeDescriptor, now: string): Entity {
    if (change.action !== 'update') {
      throw new ContractViolationError(`Expected an update for ${change.type}, got ${change.action}`);
    }
    const descriptor = this.registry.get(change.type);
    const fields = applyChanges(change);
    const rowChanges: Record<string, FieldValue> = { ...change.changes };
    let associations: Record<string, AssociationValue> = { ...change.data.associations };
    const replacedTargets: Entity[] = [];

    for (const assoc of descriptor.associations) {
      const delta = change.associations[assoc.name];
      if (!delta || delta.cardinality !== 'one' || assoc.cardinality !== 'one') continue;
      const target = delta.current ? this.persist(delta.current, now) : null;
      const foreignKey = target ? target.id : null;
      if (fields[assoc.foreignKey] !== foreignKey) {
        rowChanges[assoc.foreignKey] = foreignKey;
      }
      fields[assoc.foreignKey] = foreignKey;
      associations[assoc.name] = target;
      if (delta.replaced) {
        replacedTargets.push(delta.replaced);
      }
    }

    const changed = Object.keys(rowChanges);
    if (changed.length > 0) {
      const sql = `
        UPDATE ${descriptor.table}
        SET ${changed.map((column) => `${column} = ?`).join(', ')}, updated_at = ?
        WHERE id = ?
      `;
      const affected = this.db.execute(sql, [...encodeFields(descriptor, rowChanges, changed), now, change.data.id]);
      if (affected === 0) {
        throw new NotFoundError(descriptor.name, change.data.id);
      }
      logger.debug('Record updated', { type: descriptor.name, id: change.data.id, fields: changed });
    }

    // Swapped-out targets go only once nothing points at them any more
    for (const replaced of replacedTargets) {
      this.deleteGraph(replaced.type, replaced.id);
    }

    associations = this.persistChildren(descriptor, change, change.data.id, associations, now);

    return {
      ...change.data,
      state: 'loaded',
      updatedAt: changed.length > 0 ? now : change.data.updatedAt,
      fields,
      associations,
    };
  }

  /**
   * Hard delete of the row and its owned descendants
   */
  delete(entity: Entity): Entity {
    const removed = this.deleteGraph(entity.type, entity.id);
    if (removed === 0) {
      throw new NotFoundError(entity.type, entity.id);
    }
    return { ...entity, state: 'deleted' };
  }

  getById(type: string, id: string, preload?: AssociationRequest): Entity | null {
    const descriptor = this.registry.get(type);
    const row = this.db.queryOne<Row>(`SELECT * FROM ${descriptor.table} WHERE id = ?`, [id]);
    if (!row) {
      return null;
    }
    const entity = this.mapRowToEntity(descriptor, row);
    return preload === undefined ? entity : this.preload(entity, preload);
  }

  list(type: string, options: ListOptions = {}): Entity[] {
    const descriptor = this.registry.get(type);
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    for (const [column, value] of Object.entries(options.where ?? {})) {
      const field = descriptor.fields.find((candidate) => candidate.name === column);
      if (!field && column !== 'id') {
        throw new ContractViolationError(`${type} has no column "${column}"`);
      }
      if (value === null) {
        conditions.push(`${column} IS NULL`);
      } else {
        conditions.push(`${column} = ?`);
        values.push(field ? encodeField(field.type, value) : String(value));
      }
    }

    const orderBy = options.orderBy ?? { column: 'inserted_at', direction: 'asc' };
    if (!ROW_COLUMNS.includes(orderBy.column) && !descriptor.fields.some((f) => f.name === orderBy.column)) {
      throw new ContractViolationError(`${type} has no column "${orderBy.column}"`);
    }
    const direction = orderBy.direction === 'desc' ? 'DESC' : 'ASC';

    let sql = `SELECT * FROM ${descriptor.table}`;
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ` ORDER BY ${orderBy.column} ${direction}, id ${direction}`;
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      values.push(options.limit);
    }

    return this.db.query<Row>(sql, values).map((row) => this.mapRowToEntity(descriptor, row));
  }

  /**
   * Load the requested associations (current state) onto an entity
   */
  preload(entity: Entity, request: AssociationRequest): Entity {
    return this.preloadTree(entity, normalizeRequest(request));
  }

  /**
   * Load every hasMany descendant that is not loaded yet, i.e. everything a
   * delete of this entity would remove
   */
  loadOwnedGraph(entity: Entity): Entity {
    const descriptor = this.registry.get(entity.type);
    let result = entity;

    for (const assoc of descriptor.associations) {
      if (assoc.cardinality !== 'many') continue;
      const value = result.associations[assoc.name];
      const children =
        value === undefined || value === NOT_LOADED
          ? this.list(assoc.target, { where: { [assoc.foreignKey]: entity.id } })
          : expectMany(assoc, value, entity);
      result = withAssociation(
        result,
        assoc.name,
        children.map((child) => this.loadOwnedGraph(child))
      );
    }

    return result;
  }

  private preloadTree(entity: Entity, tree: RequestTree): Entity {
    const descriptor = this.registry.get(entity.type);
    let result = entity;

    for (const [name, nested] of tree) {
      const assoc = findAssociation(descriptor, name);
      if (!assoc) {
        throw unknownAssociation(entity.type, name);
      }

      if (assoc.cardinality === 'one') {
        const targetId = entity.fields[assoc.foreignKey];
        const target = typeof targetId === 'string' ? this.getById(assoc.target, targetId) : null;
        result = withAssociation(result, name, target ? this.preloadTree(target, nested) : null);
      } else {
        const children = this.list(assoc.target, { where: { [assoc.foreignKey]: entity.id } });
        result = withAssociation(
          result,
          name,
          children.map((child) => this.preloadTree(child, nested))
        );
      }
    }

    return result;
  }

  private persist(change: ChangeDescriptor, now: string): Entity {
    switch (change.action) {
      case 'insert':
        return this.insert(change, now);
      case 'update':
        return this.update(change, now);
      case 'replace':
        throw new ContractViolationError(`A replaced ${change.type} cannot be persisted`);
    }
  }

  private persistChildren(
    descriptor: EntityDescriptor,
    change: ChangeDescriptor,
    ownerId: string,
    associations: Record<string, AssociationValue>,
    now: string
  ): Record<string, AssociationValue> {
    const result = { ...associations };

    for (const assoc of descriptor.associations) {
      const delta = change.associations[assoc.name];
      if (!delta || delta.cardinality !== 'many' || assoc.cardinality !== 'many') continue;

      const children: Entity[] = [];
      for (const element of delta.elements) {
        if (element.action === 'replace') {
          this.deleteGraph(element.type, element.data.id);
          continue;
        }
        const owned = {
          ...element,
          changes:
            element.data.fields[assoc.foreignKey] === ownerId
              ? element.changes
              : { ...element.changes, [assoc.foreignKey]: ownerId },
        };
        children.push(this.persist(owned, now));
      }
      result[assoc.name] = children;
    }

    return result;
  }

  // Returns the number of rows removed for this entity itself (0 or 1)
  private deleteGraph(type: string, id: string): number {
    const descriptor = this.registry.get(type);

    for (const assoc of descriptor.associations) {
      if (assoc.cardinality !== 'many') continue;
      const target = this.registry.get(assoc.target);
      const childIds = this.db.query<Row>(`SELECT id FROM ${target.table} WHERE ${assoc.foreignKey} = ?`, [id]);
      for (const row of childIds) {
        this.deleteGraph(assoc.target, stringColumn(row, 'id'));
      }
    }

    const removed = this.db.execute(`DELETE FROM ${descriptor.table} WHERE id = ?`, [id]);
    if (removed > 0) {
      logger.debug('Record deleted', { type, id });
    }
    return removed;
  }

  private mapRowToEntity(descriptor: EntityDescriptor, row: Row): Entity {
    const associations: Record<string, AssociationValue> = {};
    for (const assoc of descriptor.associations) {
      associations[assoc.name] = NOT_LOADED;
    }
    return {
      type: descriptor.name,
      id: stringColumn(row, 'id'),
      state: 'loaded',
      insertedAt: stringColumn(row, 'inserted_at'),
      updatedAt: stringColumn(row, 'updated_at'),
      versionId: null,
      fields: decodeFields(descriptor, row),
      associations,
    };
  }
}
