import type { FieldConstraints } from './Constraints.js';
import type { HostType } from './HostType.js';

/** Exactly one of: required, a static value, or a factory called per instance. */
export type FieldDefault =
  | { readonly kind: 'required' }
  | { readonly kind: 'value'; readonly value: unknown }
  | { readonly kind: 'factory'; readonly factory: () => unknown };

export const REQUIRED: FieldDefault = Object.freeze({ kind: 'required' });

/** Reconciled, immutable description of one field of a synthesized model. */
export interface FieldSpec {
  /** Column name; also the property name on model instances. */
  readonly name: string;
  /** Name used for keyword input and schema properties. Equals `name` unless an alias is set. */
  readonly alias: string;
  readonly type: HostType;
  /** `null` is an accepted value. */
  readonly optional: boolean;
  readonly primaryKey: boolean;
  readonly default: FieldDefault;
  readonly constraints: FieldConstraints;
  /** Metadata outside the constraint vocabulary, emitted into the field schema by name. */
  readonly extra: Readonly<Record<string, unknown>>;
}

export function isRequired(field: FieldSpec): boolean {
  return field.default.kind === 'required';
}
