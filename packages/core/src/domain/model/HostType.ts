import type { EnumType } from './EnumType.js';

/**
 * The value type a synthesized field holds at runtime.
 *
 * A `lossless` numeric field also takes numeric text and bigint values, as
 * drivers return for BIGINT and DECIMAL columns, and keeps them as given.
 */
export type HostType =
  | { readonly kind: 'integer'; readonly lossless?: boolean }
  | { readonly kind: 'number'; readonly lossless?: boolean }
  | { readonly kind: 'string'; readonly format?: 'uuid' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'date' }
  | { readonly kind: 'datetime' }
  | { readonly kind: 'time' }
  | { readonly kind: 'json' }
  | { readonly kind: 'enum'; readonly enumType: EnumType }
  | { readonly kind: 'array'; readonly items: HostType };

/** Host types that need no further resolution. */
export type ScalarHostType = Exclude<HostType, { kind: 'enum' } | { kind: 'array' }>;

/** Which family of constraints a field accepts. */
export type ConstraintKind = 'numeric' | 'string' | 'sequence' | 'other';

export function constraintKindOf(type: HostType): ConstraintKind {
  switch (type.kind) {
    case 'integer':
    case 'number':
      return 'numeric';
    case 'string':
      return 'string';
    case 'array':
      return 'sequence';
    default:
      return 'other';
  }
}

/** Short human-readable name, used in error messages. */
export function describeHostType(type: HostType): string {
  switch (type.kind) {
    case 'enum':
      return `enum ${type.enumType.name}`;
    case 'array':
      return `array of ${describeHostType(type.items)}`;
    default:
      return type.kind;
  }
}
