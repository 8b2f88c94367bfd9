import { DataTypes } from 'sequelize';
import type { ModelAttributeColumnOptions } from 'sequelize';
import type { EnumSource, FieldInfo } from '@rowmodel/core';

/** A Sequelize attribute carrying a field-info bag. */
export type InfoColumnOptions = ModelAttributeColumnOptions & { readonly info: FieldInfo };

/** A Sequelize `ENUM` attribute bound to a declared enumeration. */
export type EnumColumnOptions = InfoColumnOptions & { readonly enumSource: EnumSource<string> };

/**
 * Attach field constraints to a Sequelize attribute.
 *
 * Sequelize keeps keys it does not know on the attribute, so the bag is still
 * there when the model is described.
 *
 * @example
 * sequelize.define('Person', {
 *   age: column({ type: DataTypes.INTEGER }, { ge: 0 }),
 * });
 */
export function column(attribute: ModelAttributeColumnOptions, info: FieldInfo = {}): InfoColumnOptions {
  return { ...attribute, info };
}

/**
 * An `ENUM` attribute whose values come from `source`.
 *
 * Columns built from the same source share one enum definition in the
 * synthesized schema.
 */
export function enumColumn(
  source: EnumSource<string>,
  attribute: Omit<ModelAttributeColumnOptions, 'type' | 'values'> = {},
  info: FieldInfo = {},
): EnumColumnOptions {
  return { ...attribute, type: DataTypes.ENUM(...source.values), enumSource: source, info };
}
