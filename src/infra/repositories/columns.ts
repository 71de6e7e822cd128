import type { FieldValue } from '../../domain/entities/Entity.js';
import { isJsonValue } from '../../domain/entities/Entity.js';
import { ContractViolationError, DatabaseError } from '../../domain/errors.js';
import type { EntityDescriptor, FieldType } from '../../domain/schema/EntityDescriptor.js';
import type { SqlValue } from '../DatabaseAdapter.js';

export type Row = Record<string, SqlValue>;

export function encodeField(type: FieldType, value: FieldValue): SqlValue {
  if (value === null) return null;

  switch (type) {
    case 'json':
      return JSON.stringify(value);
    case 'boolean':
      if (typeof value === 'boolean') return value ? 1 : 0;
      break;
    case 'integer':
    case 'float':
      if (typeof value === 'number') return value;
      break;
    case 'string':
    case 'datetime':
      if (typeof value === 'string') return value;
      break;
  }

  throw new ContractViolationError(`Cannot store ${JSON.stringify(value)} in a ${type} column`);
}

export function decodeField(type: FieldType, raw: SqlValue | undefined): FieldValue {
  if (raw === null || raw === undefined) return null;

  switch (type) {
    case 'boolean':
      return raw === 1 || raw === BigInt(1);
    case 'integer':
    case 'float':
      return typeof raw === 'number' ? raw : Number(raw);
    case 'string':
    case 'datetime':
      return typeof raw === 'string' ? raw : String(raw);
    case 'json': {
      const parsed: unknown = JSON.parse(String(raw));
      if (!isJsonValue(parsed)) {
        throw new DatabaseError('Stored JSON column holds an unsupported value');
      }
      return parsed;
    }
  }
}

export function decodeFields(descriptor: EntityDescriptor, row: Row): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  for (const field of descriptor.fields) {
    fields[field.name] = decodeField(field.type, row[field.name]);
  }
  return fields;
}

export function encodeFields(
  descriptor: EntityDescriptor,
  values: Record<string, FieldValue>,
  names: readonly string[] = descriptor.fields.map((field) => field.name)
): SqlValue[] {
  return names.map((name) => {
    const field = descriptor.fields.find((candidate) => candidate.name === name);
    if (!field) {
      throw new ContractViolationError(`${descriptor.name} has no field "${name}"`);
    }
    return encodeField(field.type, values[name] ?? null);
  });
}

export function stringColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new DatabaseError(`Expected text in column ${column}`, { column });
  }
  return value;
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
