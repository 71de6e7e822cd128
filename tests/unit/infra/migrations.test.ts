import type { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  addVersionedColumn,
  createMigrationClient,
  createVersionedTable,
  dropVersionedColumn,
  dropVersionedTable,
  renameVersionedColumn,
  renameVersionedTable,
  runMigrations,
} from '../../../src/infra/migrations.js';

type ForeignKeyRow = { table: string; from: string; to: string };
type IndexRow = { name: string };

describe('versioned table migrations', () => {
  let db: Knex;

  beforeEach(async () => {
    db = createMigrationClient({ SQLITE_DB_PATH: ':memory:' });
    await db.schema.createTable('owners', (t) => {
      t.string('id').primary();
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function createCars(): Promise<void> {
    await createVersionedTable(db, 'cars', {}, (columns) => {
      columns.string('name', { nullable: false }).string('owner_id', { references: { table: 'owners' } });
    });
  }

  it('creates the mutable table and its version table', async () => {
    await createCars();

    for (const column of ['id', 'name', 'owner_id', 'inserted_at', 'updated_at']) {
      expect(await db.schema.hasColumn('cars', column)).toBe(true);
    }
    for (const column of ['id', 'car_id', 'is_deleted', 'inserted_at', 'name', 'owner_id']) {
      expect(await db.schema.hasColumn('cars_versions', column)).toBe(true);
    }
    expect(await db.schema.hasColumn('cars_versions', 'updated_at')).toBe(false);
  });

  it('puts foreign keys on the mutable table only', async () => {
    await createCars();

    const mutable: ForeignKeyRow[] = await db.raw('PRAGMA foreign_key_list(cars)');
    const versions: ForeignKeyRow[] = await db.raw('PRAGMA foreign_key_list(cars_versions)');

    expect(mutable.map((row) => [row.table, row.from, row.to])).toEqual([['owners', 'owner_id', 'id']]);
    expect(versions).toEqual([]);
  });

  it('indexes version rows by entity and time', async () => {
    await createCars();

    const indexes: IndexRow[] = await db.raw('PRAGMA index_list(cars_versions)');

    expect(indexes.map((row) => row.name)).toContain('cars_versions_car_id_inserted_at_index');
  });

  it('rejects a column named like the history reference', async () => {
    await expect(
      createVersionedTable(db, 'cars', {}, (columns) => {
        columns.string('car_id');
      })
    ).rejects.toThrow('Column cars.car_id collides with the history-reference column');
  });

  it('adds, renames and drops columns on both tables', async () => {
    await createCars();

    await addVersionedColumn(db, 'cars', 'colour', 'string');
    expect(await db.schema.hasColumn('cars', 'colour')).toBe(true);
    expect(await db.schema.hasColumn('cars_versions', 'colour')).toBe(true);

    await renameVersionedColumn(db, 'cars', 'colour', 'paint');
    expect(await db.schema.hasColumn('cars', 'paint')).toBe(true);
    expect(await db.schema.hasColumn('cars_versions', 'paint')).toBe(true);
    expect(await db.schema.hasColumn('cars_versions', 'colour')).toBe(false);

    await dropVersionedColumn(db, 'cars', 'paint');
    expect(await db.schema.hasColumn('cars', 'paint')).toBe(false);
    expect(await db.schema.hasColumn('cars_versions', 'paint')).toBe(false);
  });

  it('renames both tables and follows a new singular', async () => {
    await createCars();

    await renameVersionedTable(db, 'cars', 'vehicles');

    expect(await db.schema.hasTable('cars')).toBe(false);
    expect(await db.schema.hasTable('cars_versions')).toBe(false);
    expect(await db.schema.hasColumn('vehicles_versions', 'vehicle_id')).toBe(true);
    expect(await db.schema.hasColumn('vehicles_versions', 'car_id')).toBe(false);
    const indexes: IndexRow[] = await db.raw('PRAGMA index_list(vehicles_versions)');
    expect(indexes.map((row) => row.name)).toContain('vehicles_versions_vehicle_id_inserted_at_index');
  });

  it('drops both tables', async () => {
    await createCars();

    await dropVersionedTable(db, 'cars');

    expect(await db.schema.hasTable('cars')).toBe(false);
    expect(await db.schema.hasTable('cars_versions')).toBe(false);
  });

  it('applies in-code migrations once', async () => {
    const migrations = {
      '001_create_cars': {
        up: (knex: Knex) => createVersionedTable(knex, 'cars', {}, (columns) => columns.string('name')),
        down: (knex: Knex) => dropVersionedTable(knex, 'cars'),
      },
    };

    expect(await runMigrations(db, migrations)).toEqual(['001_create_cars']);
    expect(await runMigrations(db, migrations)).toEqual([]);
    expect(await db.schema.hasTable('cars_versions')).toBe(true);
  });
});
