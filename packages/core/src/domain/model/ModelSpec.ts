import type { EnumType } from './EnumType.js';
import type { FieldSpec } from './FieldSpec.js';
import type { ModelConfig } from './ModelConfig.js';

/** Reads a column value off a live record instance. */
export type AttributeReader = (record: object, column: string) => unknown;

/** Everything the model runtime needs to build a validated model type. */
export interface ModelSpec {
  readonly name: string;
  /** In declaration order. */
  readonly fields: readonly FieldSpec[];
  /** Distinct enumerations referenced by the fields, in order of first use. */
  readonly enums: readonly EnumType[];
  /** Caller-supplied configuration, not interpreted during synthesis. */
  readonly config?: ModelConfig;
  readonly readAttribute: AttributeReader;
}

export const readProperty: AttributeReader = (record, column) => Reflect.get(record, column);
