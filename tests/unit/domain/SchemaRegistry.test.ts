import { describe, expect, it } from 'vitest';
import { ConfigError, ContractViolationError } from '../../../src/domain/errors.js';
import { defineEntity } from '../../../src/domain/schema/EntityDescriptor.js';
import { createSchemaRegistry } from '../../../src/domain/schema/SchemaRegistry.js';
import { Garage, createTestRegistry } from '../../fixtures/schema.js';

describe('SchemaRegistry', () => {
  const registry = createTestRegistry();

  it('derives table names and reference fields', () => {
    const person = registry.get('Person');

    expect(person.singular).toBe('person');
    expect(person.versionsTable).toBe('people_versions');
    expect(person.referenceField).toBe('person_id');
    expect(person.tracked).toBe(true);
    expect(person.exposeVersionId).toBe(false);
  });

  it('trims a trailing s for the default singular', () => {
    const car = registry.get('Car');

    expect(car.singular).toBe('car');
    expect(car.referenceField).toBe('car_id');
    expect(car.exposeVersionId).toBe(true);
  });

  it('adds belongsTo foreign keys after the declared fields', () => {
    expect(registry.get('Person').fields.map((field) => field.name)).toEqual([
      'name',
      'age',
      'tags',
      'car_id',
      'garage_id',
    ]);
  });

  it('resolves associations into the four tracked/cardinality variants', () => {
    expect(registry.get('Person').associations).toEqual([
      {
        cardinality: 'one',
        tracked: true,
        name: 'car',
        target: 'Car',
        foreignKey: 'car_id',
        versionField: 'car_version',
      },
      { cardinality: 'one', tracked: false, name: 'garage', target: 'Garage', foreignKey: 'garage_id' },
      {
        cardinality: 'many',
        tracked: true,
        name: 'fancy_hobbies',
        target: 'Hobby',
        foreignKey: 'person_id',
        versionField: 'fancy_hobby_versions',
      },
    ]);
    expect(registry.get('Car').associations[0]).toMatchObject({
      cardinality: 'many',
      foreignKey: 'car_id',
      versionField: 'passenger_people_versions',
    });
  });

  it('marks types without a version table as untracked', () => {
    expect(registry.isTracked('Garage')).toBe(false);
    expect(registry.isTracked('Hobby')).toBe(true);
    expect(registry.isTracked('Boat')).toBe(false);
  });

  it('throws a contract violation for unknown types', () => {
    expect(() => registry.get('Boat')).toThrow(ContractViolationError);
  });

  it('rejects versioned associations to untracked types', () => {
    const Shed = defineEntity({
      name: 'Shed',
      table: 'sheds',
      fields: { name: 'string' },
      associations: { garage: { kind: 'belongsTo', target: 'Garage', versioned: true } },
    });

    expect(() => createSchemaRegistry([Garage, Shed])).toThrow(
      new ConfigError('Association Shed.garage is versioned but Garage has no version table')
    );
  });

  it('rejects hasMany associations whose foreign key is missing on the target', () => {
    const Shed = defineEntity({
      name: 'Shed',
      table: 'sheds',
      fields: {},
      associations: { garages: { kind: 'hasMany', target: 'Garage' } },
    });

    expect(() => createSchemaRegistry([Garage, Shed])).toThrow(
      'Association Shed.garages expects Garage.shed_id to exist'
    );
  });

  it('rejects reserved column names', () => {
    const Shed = defineEntity({ name: 'Shed', table: 'sheds', fields: { inserted_at: 'string' } });

    expect(() => createSchemaRegistry([Shed])).toThrow(ConfigError);
  });

  it('rejects fields colliding with the history-reference field', () => {
    const Shed = defineEntity({ name: 'Shed', table: 'sheds', fields: { shed_id: 'string' } });

    expect(() => createSchemaRegistry([Shed])).toThrow(
      'Field Shed.shed_id collides with the history-reference field'
    );
  });

  it('rejects unknown targets, duplicate names and bad identifiers', () => {
    const Shed = defineEntity({
      name: 'Shed',
      table: 'sheds',
      fields: {},
      associations: { boat: { kind: 'belongsTo', target: 'Boat' } },
    });

    expect(() => createSchemaRegistry([Shed])).toThrow('Association Shed.boat targets unknown type "Boat"');
    expect(() => createSchemaRegistry([Garage, Garage])).toThrow('Entity type "Garage" is defined twice');
    expect(() =>
      createSchemaRegistry([defineEntity({ name: 'Bad', table: 'bad table', fields: {} })])
    ).toThrow('Invalid SQL identifier for table of Bad: "bad table"');
  });
});
