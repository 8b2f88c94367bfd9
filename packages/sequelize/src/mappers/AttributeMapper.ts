import { randomUUID } from 'node:crypto';
import { DataTypes } from 'sequelize';
import type { DataType, ModelAttributeColumnOptions } from 'sequelize';
import { EnumSource, NO_DEFAULT, toColumnDefault } from '@rowmodel/core';
import type { ColumnDefault, ColumnDescriptor, StorageType } from '@rowmodel/core';
import { readInfo } from '../utils/readInfo.js';

/** `payment_status` → `PaymentStatus`. */
export function pascalCase(name: string): string {
  return name
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

function typeKey(type: DataType): string {
  if (typeof type === 'string') {
    // Raw SQL type, e.g. `varchar(20)` or `double precision`
    return type.trim().split(/[\s(]/)[0]?.toUpperCase() ?? type;
  }
  return type.key;
}

/** Enum facts an attribute may carry beside its type. */
interface EnumHints {
  readonly values?: readonly string[];
  readonly enumSource?: unknown;
}

function enumValues(type: DataType, hints: EnumHints): readonly string[] {
  if (type instanceof DataTypes.ENUM) return type.values;
  return hints.values ?? [];
}

function describeType(column: string, type: DataType, hints: EnumHints = {}): StorageType {
  if (type instanceof DataTypes.STRING) {
    const length = type.options?.length;
    return length !== undefined ? { key: type.key, length } : { key: type.key };
  }
  if (type instanceof DataTypes.ARRAY) {
    return { key: 'ARRAY', itemType: describeType(column, type.options.type) };
  }

  const key = typeKey(type);
  if (key !== 'ENUM') return { key };

  const enumSource =
    hints.enumSource instanceof EnumSource
      ? hints.enumSource
      : new EnumSource(
          pascalCase(column),
          enumValues(type, hints).map((value) => ({ name: value, value })),
        );
  return { key, enumSource };
}

function isDataType(value: unknown, type: { readonly key: string }): boolean {
  if (value === type) return true;
  return typeof value === 'object' && value !== null && Reflect.get(value, 'key') === type.key;
}

function describeDefault(value: unknown): ColumnDefault {
  if (value === undefined) return NO_DEFAULT;
  if (isDataType(value, DataTypes.NOW)) {
    return { kind: 'factory', factory: () => new Date() };
  }
  // Both are generated client-side; a v1 request also gets a random (v4) UUID.
  if (isDataType(value, DataTypes.UUIDV4) || isDataType(value, DataTypes.UUIDV1)) {
    return { kind: 'factory', factory: () => randomUUID() };
  }
  return toColumnDefault(value);
}

/**
 * Describe one Sequelize attribute as a column.
 *
 * Reads the `info` bag and the `enumSource` set by {@link column} and
 * {@link enumColumn}. `comment` becomes the field description unless the
 * info bag sets its own.
 */
export function describeAttribute(name: string, attribute: ModelAttributeColumnOptions): ColumnDescriptor {
  const info = readInfo(name, Reflect.get(attribute, 'info'));
  const description = attribute.comment !== undefined && info['description'] === undefined ? attribute.comment : undefined;

  return {
    name,
    storageType: describeType(name, attribute.type, {
      ...(attribute.values !== undefined ? { values: attribute.values } : {}),
      enumSource: Reflect.get(attribute, 'enumSource'),
    }),
    nullable: attribute.allowNull ?? true,
    primaryKey: attribute.primaryKey ?? false,
    autoIncrement: attribute.autoIncrement ?? false,
    default: describeDefault(attribute.defaultValue),
    info: description !== undefined ? { ...info, description } : info,
  };
}
