import type { EnumSource } from './EnumSource.js';
import type { FieldInfo } from './Constraints.js';

/** Storage-level type of a column, as the record-model framework declares it. */
export interface StorageType {
  /** Upper-case storage key, e.g. `INTEGER`, `STRING`, `ENUM`, `ARRAY`. */
  readonly key: string;
  /** Declared length of a bounded string type. Absent for unbounded types. */
  readonly length?: number;
  /** Enumeration backing an `ENUM` column. */
  readonly enumSource?: EnumSource;
  /** Element type of an `ARRAY` column. */
  readonly itemType?: StorageType;
}

/** Default declared on a column. A factory is called once per model instance. */
export type ColumnDefault =
  | { readonly kind: 'none' }
  | { readonly kind: 'value'; readonly value: unknown }
  | { readonly kind: 'factory'; readonly factory: () => unknown };

/** Read-only description of one column of a record model. */
export interface ColumnDescriptor {
  readonly name: string;
  readonly storageType: StorageType;
  readonly nullable: boolean;
  readonly primaryKey: boolean;
  readonly autoIncrement: boolean;
  readonly default: ColumnDefault;
  /** Metadata bag attached by the record-model author. Checked against the vocabulary at synthesis. */
  readonly info: Readonly<Record<string, unknown>>;
}

export const NO_DEFAULT: ColumnDefault = Object.freeze({ kind: 'none' });

export interface DescribeColumnOptions {
  readonly nullable?: boolean;
  readonly primaryKey?: boolean;
  readonly autoIncrement?: boolean;
  /** A zero-argument function becomes a factory; any other value a static default. */
  readonly default?: unknown;
  readonly info?: FieldInfo;
}

/** Wrap a declared default value, treating a function as a per-instance factory. */
export function toColumnDefault(value: unknown): ColumnDefault {
  if (value === undefined) return NO_DEFAULT;
  if (typeof value === 'function') {
    const fn = value;
    return { kind: 'factory', factory: (): unknown => Reflect.apply(fn, undefined, []) };
  }
  return { kind: 'value', value };
}

/**
 * Build a column descriptor by hand, for record models that have no framework adapter.
 *
 * Columns are nullable unless stated otherwise, matching SQL.
 */
export function describeColumn(
  name: string,
  storageType: StorageType | string,
  options: DescribeColumnOptions = {},
): ColumnDescriptor {
  return {
    name,
    storageType: typeof storageType === 'string' ? { key: storageType } : storageType,
    nullable: options.nullable ?? true,
    primaryKey: options.primaryKey ?? false,
    autoIncrement: options.autoIncrement ?? false,
    default: toColumnDefault(options.default),
    info: options.info ?? {},
  };
}
