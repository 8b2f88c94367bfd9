import type { ColumnDescriptor, StorageType } from '../model/ColumnDescriptor.js';
import type { FieldConstraints } from '../model/Constraints.js';
import { parseConstraints } from '../model/Constraints.js';
import type { FieldDefault, FieldSpec } from '../model/FieldSpec.js';
import { REQUIRED } from '../model/FieldSpec.js';
import type { HostType, ScalarHostType } from '../model/HostType.js';
import { constraintKindOf, describeHostType } from '../model/HostType.js';
import type { EnumRegistry } from './EnumRegistry.js';
import { ConstraintConflictError, InvalidConstraintError, UnsupportedTypeError } from '../errors.js';

/** Storage keys with a direct host type. `ENUM` and `ARRAY` are resolved separately. */
const STORAGE_TYPE_MAP: ReadonlyMap<string, ScalarHostType> = new Map(
  Object.entries<ScalarHostType>({
    INTEGER: { kind: 'integer' },
    BIGINT: { kind: 'integer', lossless: true },
    SMALLINT: { kind: 'integer' },
    MEDIUMINT: { kind: 'integer' },
    TINYINT: { kind: 'integer' },
    FLOAT: { kind: 'number' },
    DOUBLE: { kind: 'number' },
    'DOUBLE PRECISION': { kind: 'number' },
    NUMBER: { kind: 'number' },
    REAL: { kind: 'number' },
    DECIMAL: { kind: 'number', lossless: true },
    STRING: { kind: 'string' },
    CHAR: { kind: 'string' },
    TEXT: { kind: 'string' },
    CITEXT: { kind: 'string' },
    UUID: { kind: 'string', format: 'uuid' },
    BOOLEAN: { kind: 'boolean' },
    DATE: { kind: 'datetime' },
    DATEONLY: { kind: 'date' },
    TIME: { kind: 'time' },
    JSON: { kind: 'json' },
    JSONB: { kind: 'json' },
  }),
);

/** Storage keys that can be resolved to a field type. */
export const SUPPORTED_STORAGE_KEYS: readonly string[] = [...STORAGE_TYPE_MAP.keys(), 'ENUM', 'ARRAY'];

function resolveHostType(column: string, storage: StorageType, enums: EnumRegistry): HostType {
  if (storage.key === 'ENUM') {
    if (!storage.enumSource) throw new UnsupportedTypeError(column, 'ENUM without members');
    return { kind: 'enum', enumType: enums.resolve(storage.enumSource) };
  }
  if (storage.key === 'ARRAY') {
    if (!storage.itemType) throw new UnsupportedTypeError(column, 'ARRAY without item type');
    return { kind: 'array', items: resolveHostType(column, storage.itemType, enums) };
  }
  const mapped = STORAGE_TYPE_MAP.get(storage.key);
  if (!mapped) throw new UnsupportedTypeError(column, storage.key);
  return mapped;
}

function resolveDefault(column: ColumnDescriptor): FieldDefault {
  // Identity values are never fabricated: a primary key must always be supplied.
  if (column.primaryKey) return REQUIRED;

  switch (column.default.kind) {
    case 'factory':
      return { kind: 'factory', factory: column.default.factory };
    case 'value':
      return { kind: 'value', value: column.default.value };
    case 'none':
      return column.nullable ? { kind: 'value', value: null } : REQUIRED;
  }
}

/**
 * `const` in metadata is a flag: when truthy the field must hold its static
 * default, and the default becomes the reconciled `const`. A falsy flag adds nothing.
 */
function resolveConst(column: ColumnDescriptor, constraints: FieldConstraints, fieldDefault: FieldDefault): FieldConstraints {
  const { const: pinned, ...rest } = constraints;
  if (!pinned) return rest;
  if (fieldDefault.kind !== 'value') {
    throw new InvalidConstraintError(column.name, `Column '${column.name}' sets const but has no static default to hold`, {
      key: 'const',
    });
  }
  return { ...rest, const: fieldDefault.value };
}

function resolveConstraints(
  column: ColumnDescriptor,
  type: HostType,
  fieldDefault: FieldDefault,
): { constraints: FieldConstraints; extra: Readonly<Record<string, unknown>> } {
  const kind = constraintKindOf(type);
  const parsed = parseConstraints(kind, column.info);
  if (!parsed.ok) {
    const first = parsed.violations[0];
    const summary = parsed.violations.map((v) => `'${v.key}' ${v.message}`).join('; ');
    throw new InvalidConstraintError(
      column.name,
      `Invalid info on column '${column.name}' (${describeHostType(type)}): ${summary}`,
      { key: first?.key, violations: parsed.violations },
    );
  }

  const declaredLength = kind === 'string' ? column.storageType.length : undefined;
  const { maxLength } = parsed.constraints;
  if (declaredLength !== undefined && maxLength !== undefined && maxLength !== declaredLength) {
    throw new ConstraintConflictError(column.name, 'maxLength', declaredLength, maxLength);
  }

  const pinned = resolveConst(column, parsed.constraints, fieldDefault);
  const constraints: FieldConstraints = declaredLength !== undefined ? { ...pinned, maxLength: declaredLength } : pinned;
  return { constraints, extra: parsed.extra };
}

/**
 * Turn one column into a field specification.
 *
 * Merges what the column type declares (storage type, nullability, default,
 * bounded length) with the column's metadata bag. A bounded length and a
 * metadata `maxLength` must agree.
 *
 * @throws UnsupportedTypeError when the storage type has no mapping rule
 * @throws ConstraintConflictError when the declared length and metadata disagree
 * @throws InvalidConstraintError when metadata uses a constraint that does not apply to the field,
 * or sets `const` on a field without a static default
 */
export function synthesizeField(column: ColumnDescriptor, enums: EnumRegistry): FieldSpec {
  const type = resolveHostType(column.name, column.storageType, enums);
  const fieldDefault = resolveDefault(column);
  const { constraints, extra } = resolveConstraints(column, type, fieldDefault);

  return Object.freeze({
    name: column.name,
    alias: constraints.alias ?? column.name,
    type,
    optional: column.nullable || column.primaryKey,
    primaryKey: column.primaryKey,
    default: fieldDefault,
    constraints: Object.freeze(constraints),
    extra: Object.freeze({ ...extra }),
  });
}
