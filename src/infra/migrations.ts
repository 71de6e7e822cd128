import knex from 'knex';
import type { Knex } from 'knex';
import { ConfigError } from '../domain/errors.js';
import { defaultSingular } from '../domain/schema/EntityDescriptor.js';
import type { FieldType } from '../domain/schema/EntityDescriptor.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

/**
 * Schema helpers that keep a mutable table and its `<table>_versions` table in
 * step. Version tables carry `id`, `<singular>_id`, `is_deleted`,
 * `inserted_at` and a copy of every data column.
 */

export type ColumnReference = {
  table: string;
  column?: string;
  onDelete?: 'CASCADE' | 'SET NULL' | 'RESTRICT' | 'NO ACTION';
};

export type ColumnOptions = {
  nullable?: boolean;
  /** Foreign key, applied to the mutable table only */
  references?: ColumnReference;
};

export type VersionedTableOptions = {
  /** Defaults to the table name without a trailing "s" */
  singular?: string;
};

type ColumnSpec = { name: string; type: FieldType; options: ColumnOptions };

/**
 * Column collector handed to `createVersionedTable`; every column lands on
 * both tables
 */
export class VersionedColumns {
  readonly specs: ColumnSpec[] = [];

  column(name: string, type: FieldType, options: ColumnOptions = {}): this {
    this.specs.push({ name, type, options });
    return this;
  }

  string(name: string, options?: ColumnOptions): this {
    return this.column(name, 'string', options);
  }

  integer(name: string, options?: ColumnOptions): this {
    return this.column(name, 'integer', options);
  }

  float(name: string, options?: ColumnOptions): this {
    return this.column(name, 'float', options);
  }

  boolean(name: string, options?: ColumnOptions): this {
    return this.column(name, 'boolean', options);
  }

  datetime(name: string, options?: ColumnOptions): this {
    return this.column(name, 'datetime', options);
  }

  json(name: string, options?: ColumnOptions): this {
    return this.column(name, 'json', options);
  }
}

export function versionsTableName(table: string): string {
  return `${table}_versions`;
}

export function referenceColumn(table: string, singular?: string): string {
  return `${singular ?? defaultSingular(table)}_id`;
}

function historyIndexName(table: string, reference: string): string {
  return `${versionsTableName(table)}_${reference}_inserted_at_index`;
}

export async function createVersionedTable(
  db: Knex,
  table: string,
  options: VersionedTableOptions,
  build: (columns: VersionedColumns) => void
): Promise<void> {
  const columns = new VersionedColumns();
  build(columns);
  const reference = referenceColumn(table, options.singular);
  if (columns.specs.some((spec) => spec.name === reference)) {
    throw new ConfigError(`Column ${table}.${reference} collides with the history-reference column`);
  }

  await db.schema.createTable(table, (t) => {
    t.string('id').primary();
    for (const spec of columns.specs) {
      addColumn(t, spec, true);
    }
    t.string('inserted_at').notNullable();
    t.string('updated_at').notNullable();
  });

  await db.schema.createTable(versionsTableName(table), (t) => {
    t.string('id').primary();
    t.string(reference).notNullable();
    t.boolean('is_deleted').notNullable().defaultTo(false);
    t.string('inserted_at').notNullable();
    for (const spec of columns.specs) {
      addColumn(t, spec, false);
    }
    t.index([reference, 'inserted_at'], historyIndexName(table, reference));
  });

  logger.info('Versioned table created', { table, versionsTable: versionsTableName(table) });
}

export async function addVersionedColumn(
  db: Knex,
  table: string,
  column: string,
  type: FieldType,
  options: ColumnOptions = {}
): Promise<void> {
  const spec = { name: column, type, options };
  await db.schema.alterTable(table, (t) => addColumn(t, spec, true));
  await db.schema.alterTable(versionsTableName(table), (t) => addColumn(t, spec, false));
}

export async function renameVersionedColumn(db: Knex, table: string, from: string, to: string): Promise<void> {
  await db.schema.alterTable(table, (t) => t.renameColumn(from, to));
  await db.schema.alterTable(versionsTableName(table), (t) => t.renameColumn(from, to));
}

export async function dropVersionedColumn(db: Knex, table: string, column: string): Promise<void> {
  await db.schema.alterTable(table, (t) => t.dropColumn(column));
  await db.schema.alterTable(versionsTableName(table), (t) => t.dropColumn(column));
}

/**
 * Renames both tables; when the singular changes the history-reference
 * column and its index follow
 */
export async function renameVersionedTable(
  db: Knex,
  from: string,
  to: string,
  options: { fromSingular?: string; toSingular?: string } = {}
): Promise<void> {
  await db.schema.renameTable(from, to);
  await db.schema.renameTable(versionsTableName(from), versionsTableName(to));

  const oldReference = referenceColumn(from, options.fromSingular);
  const newReference = referenceColumn(to, options.toSingular);
  // A column rebuild may already have dropped it
  await db.raw('DROP INDEX IF EXISTS ??', [historyIndexName(from, oldReference)]);
  if (oldReference !== newReference) {
    await db.schema.alterTable(versionsTableName(to), (t) => t.renameColumn(oldReference, newReference));
  }
  await db.schema.alterTable(versionsTableName(to), (t) => {
    t.index([newReference, 'inserted_at'], historyIndexName(to, newReference));
  });
}

export async function dropVersionedTable(db: Knex, table: string): Promise<void> {
  await db.schema.dropTableIfExists(versionsTableName(table));
  await db.schema.dropTableIfExists(table);
}

function addColumn(t: Knex.TableBuilder, spec: ColumnSpec, mutable: boolean): void {
  const column = columnBuilder(t, spec);
  if (spec.options.nullable === false && mutable) {
    column.notNullable();
  } else {
    column.nullable();
  }
  const ref = spec.options.references;
  if (mutable && ref) {
    const foreign = t.foreign(spec.name).references(ref.column ?? 'id').inTable(ref.table);
    if (ref.onDelete) {
      foreign.onDelete(ref.onDelete);
    }
  }
}

function columnBuilder(t: Knex.TableBuilder, spec: ColumnSpec): Knex.ColumnBuilder {
  switch (spec.type) {
    case 'string':
    case 'datetime':
      return t.string(spec.name);
    case 'integer':
      return t.integer(spec.name);
    case 'float':
      return t.float(spec.name);
    case 'boolean':
      return t.boolean(spec.name);
    case 'json':
      return t.text(spec.name);
  }
}

/**
 * Migrations supplied in code, applied in key order
 */
export type MigrationSet = Record<string, Knex.Migration>;

export function createMigrationClient(env: Pick<Env, 'SQLITE_DB_PATH'>): Knex {
  return knex({
    client: 'better-sqlite3',
    connection: {
      filename: env.SQLITE_DB_PATH,
    },
    useNullAsDefault: true,
  });
}

export async function runMigrations(db: Knex, migrations: MigrationSet): Promise<string[]> {
  const names = Object.keys(migrations).sort();
  const source: Knex.MigrationSource<string> = {
    getMigrations: async () => names,
    getMigrationName: (name) => name,
    getMigration: async (name) => {
      const migration = migrations[name];
      if (!migration) {
        throw new ConfigError(`Unknown migration ${name}`);
      }
      return migration;
    },
  };

  const [batch, log]: [number, string[]] = await db.migrate.latest({ migrationSource: source });
  if (log.length > 0) {
    logger.info('Database migrations applied', { batch, migrations: log });
  } else {
    logger.info('Database migrations up to date');
  }
  return log;
}
