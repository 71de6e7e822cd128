import { beforeEach, describe, expect, it } from 'vitest';
import { cast, change } from '../../../src/domain/entities/ChangeDescriptor.js';
import { buildEntity } from '../../../src/domain/entities/Entity.js';
import type { Entity } from '../../../src/domain/entities/Entity.js';
import type { VersionAssociation, VersionRow } from '../../../src/domain/entities/Version.js';
import { ContractViolationError } from '../../../src/domain/errors.js';
import type { SchemaRegistry } from '../../../src/domain/schema/SchemaRegistry.js';
import type { VersionedStore } from '../../../src/services/VersionedStore.js';
import { createTestStore } from '../../fixtures/database.js';

function versionList(value: VersionAssociation | undefined): VersionRow[] {
  if (!Array.isArray(value)) {
    throw new Error('expected a list of versions');
  }
  const items: Array<VersionRow | Entity> = value;
  return items.filter((item): item is VersionRow => 'entityId' in item);
}

function versionOne(value: VersionAssociation | undefined): VersionRow | null {
  if (value === undefined || value === null || Array.isArray(value) || !('entityId' in value)) {
    return null;
  }
  return value;
}

describe('HistoryService', () => {
  let registry: SchemaRegistry;
  let store: VersionedStore;

  beforeEach(() => {
    ({ registry, store } = createTestStore());
  });

  function loaded(type: string, id: string, preload?: string): Entity {
    const entity = store.records.getById(type, id, preload);
    if (!entity) {
      throw new Error(`${type} ${id} is missing`);
    }
    return entity;
  }

  function versionOf(type: string, id: string, index: number): VersionRow {
    const version = store.history(type, id)[index];
    if (!version) {
      throw new Error(`no version ${index} of ${type} ${id}`);
    }
    return version;
  }

  it('rebuilds a to-many association as it was at each version', () => {
    // T0: Ann with chess and go
    const person = store.insert(
      buildEntity(
        registry,
        'Person',
        { name: 'Ann' },
        {
          fancy_hobbies: [
            buildEntity(registry, 'Hobby', { name: 'chess' }),
            buildEntity(registry, 'Hobby', { name: 'go' }),
          ],
        }
      )
    );
    const [chess] = store.records.list('Hobby', { orderBy: { column: 'name' } });
    if (!chess) throw new Error('chess missing');

    // T1: go dropped
    store.update(cast(registry, loaded('Person', person.id, 'fancy_hobbies'), { fancy_hobbies: [{ id: chess.id }] }));
    // T2: renamed, poker added
    store.update(
      cast(registry, loaded('Person', person.id, 'fancy_hobbies'), {
        name: 'Anna',
        fancy_hobbies: [{ id: chess.id }, { name: 'poker' }],
      })
    );

    const first = store.reconstructAssociations(versionOf('Person', person.id, 1), 'fancy_hobbies');
    const latest = store.reconstructAssociations(versionOf('Person', person.id, 0), ['fancy_hobbies']);

    const names = (version: VersionRow) =>
      versionList(version.associations.fancy_hobby_versions)
        .map((hobby) => hobby.fields.name)
        .sort();
    expect(first.fields.name).toBe('Ann');
    expect(names(first)).toEqual(['chess', 'go']);
    expect(latest.fields.name).toBe('Anna');
    expect(names(latest)).toEqual(['chess', 'poker']);
  });

  it('rebuilds a to-one association from the target version of that time', () => {
    const person = store.insert(
      buildEntity(registry, 'Person', { name: 'Ann' }, { car: buildEntity(registry, 'Car', { name: 'Toad' }) })
    );
    const carId = loaded('Person', person.id).fields.car_id;
    if (typeof carId !== 'string') throw new Error('car missing');
    store.update(change(registry, loaded('Car', carId), { name: 'Magnificent' }));
    store.update(change(registry, loaded('Person', person.id), { age: 31 }));

    const before = store.reconstructAssociations(versionOf('Person', person.id, 1), 'car');
    const after = store.reconstructAssociations(versionOf('Person', person.id, 0), 'car');

    expect(versionOne(before.associations.car_version)?.fields.name).toBe('Toad');
    expect(versionOne(after.associations.car_version)?.fields.name).toBe('Magnificent');
  });

  it('follows nested requests through tracked associations', () => {
    const person = store.insert(
      buildEntity(
        registry,
        'Person',
        { name: 'Bo' },
        {
          car: buildEntity(
            registry,
            'Car',
            { name: 'Toad' },
            { passenger_people: [buildEntity(registry, 'PassengerPerson', { name: 'Pat' })] }
          ),
        }
      )
    );

    const version = store.reconstructAssociations(versionOf('Person', person.id, 0), { car: ['passenger_people'] });
    const car = versionOne(version.associations.car_version);

    expect(car?.fields.name).toBe('Toad');
    expect(versionList(car?.associations.passenger_people_versions).map((pp) => pp.fields.name)).toEqual(['Pat']);
  });

  it('reads untracked associations from current state', () => {
    const garage = store.insert(buildEntity(registry, 'Garage', { name: 'North' }));
    const person = store.insert(buildEntity(registry, 'Person', { name: 'Ann', garage_id: garage.id }));
    store.update(change(registry, loaded('Garage', garage.id), { name: 'South' }));

    const version = store.reconstructAssociations(versionOf('Person', person.id, 0), 'garage');

    expect(version.associations.garage).toMatchObject({ id: garage.id, fields: { name: 'South' } });
  });

  it('returns null for a to-one association that was empty', () => {
    const person = store.insert(buildEntity(registry, 'Person', { name: 'Ann' }));

    const version = store.reconstructAssociations(versionOf('Person', person.id, 0), ['car', 'garage']);

    expect(version.associations.car_version).toBeNull();
    expect(version.associations.garage).toBeNull();
  });

  it('rejects unknown association names', () => {
    const person = store.insert(buildEntity(registry, 'Person', { name: 'Ann' }));

    expect(() => store.reconstructAssociations(versionOf('Person', person.id, 0), 'boats')).toThrow(
      ContractViolationError
    );
  });
});
