import { z } from 'zod';
import type { ConstraintKind } from './HostType.js';

/** Documentation and identity keys accepted on every field. */
export interface CommonConstraints {
  /** Property name the model exposes instead of the column name. */
  readonly alias?: string;
  readonly title?: string;
  readonly description?: string;
  /** In metadata a flag; once reconciled, the static default the field must hold. */
  readonly const?: unknown;
  readonly example?: unknown;
  /** `false` rejects assignment once the model validates assignments. */
  readonly allowMutation?: boolean;
}

export interface NumericConstraints {
  readonly ge?: number;
  readonly gt?: number;
  readonly le?: number;
  readonly lt?: number;
  readonly multipleOf?: number;
}

export interface StringConstraints {
  readonly minLength?: number;
  readonly maxLength?: number;
  /** Source of a regular expression the value must match. */
  readonly regex?: string;
}

export interface SequenceConstraints {
  readonly minItems?: number;
  readonly maxItems?: number;
}

/** Reconciled constraints of one field. Only keys legal for the field's kind are ever set. */
export type FieldConstraints = CommonConstraints & NumericConstraints & StringConstraints & SequenceConstraints;

export type ConstraintKey = keyof FieldConstraints;

/**
 * Free-form metadata attached to a column by the record-model author.
 *
 * Vocabulary keys are typed; any other key is carried through to the
 * field's JSON Schema unchanged.
 */
export interface FieldInfo extends FieldConstraints {
  readonly [key: string]: unknown;
}

/** JSON-Schema keyword for each vocabulary key that is renamed on output. */
export const JSON_SCHEMA_KEYWORDS = {
  ge: 'minimum',
  gt: 'exclusiveMinimum',
  le: 'maximum',
  lt: 'exclusiveMaximum',
  multipleOf: 'multipleOf',
  minItems: 'minItems',
  maxItems: 'maxItems',
  minLength: 'minLength',
  maxLength: 'maxLength',
  regex: 'pattern',
} as const satisfies Partial<Record<ConstraintKey, string>>;

/** Vocabulary keys emitted into the field schema under their own name. */
export const PASSTHROUGH_KEYS = ['const', 'example', 'allowMutation'] as const satisfies readonly ConstraintKey[];

const size = z.number().int().nonnegative();
const bound = z.number().finite();

function isRegexSource(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const commonShape = {
  alias: z.string().min(1).optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  const: z.unknown().optional(),
  example: z.unknown().optional(),
  allowMutation: z.boolean().optional(),
};

const numericShape = {
  ge: bound.optional(),
  gt: bound.optional(),
  le: bound.optional(),
  lt: bound.optional(),
  multipleOf: z.number().finite().positive().optional(),
};

const stringShape = {
  minLength: size.optional(),
  maxLength: size.optional(),
  regex: z.string().refine(isRegexSource, 'must be a valid regular expression').optional(),
};

const sequenceShape = {
  minItems: size.optional(),
  maxItems: size.optional(),
};

const otherConstraints = z.object(commonShape).strict();
const numericConstraints = z.object({ ...commonShape, ...numericShape }).strict();
const stringConstraints = z.object({ ...commonShape, ...stringShape }).strict();
const sequenceConstraints = z.object({ ...commonShape, ...sequenceShape }).strict();

/** Every key the vocabulary recognizes, whatever the kind. */
export const VOCABULARY: ReadonlySet<string> = new Set([
  ...Object.keys(commonShape),
  ...Object.keys(numericShape),
  ...Object.keys(stringShape),
  ...Object.keys(sequenceShape),
]);

function constraintsSchemaFor(kind: ConstraintKind) {
  switch (kind) {
    case 'numeric':
      return numericConstraints;
    case 'string':
      return stringConstraints;
    case 'sequence':
      return sequenceConstraints;
    case 'other':
      return otherConstraints;
  }
}

/** A vocabulary violation found while reading a metadata bag. */
export interface ConstraintViolation {
  readonly key: string;
  readonly reason: 'not-applicable' | 'invalid-value';
  readonly message: string;
}

export type ConstraintParseResult =
  | { readonly ok: true; readonly constraints: FieldConstraints; readonly extra: Readonly<Record<string, unknown>> }
  | { readonly ok: false; readonly violations: readonly ConstraintViolation[] };

/**
 * Split a metadata bag into vocabulary constraints legal for `kind` and
 * passthrough entries outside the vocabulary.
 */
export function parseConstraints(kind: ConstraintKind, info: Readonly<Record<string, unknown>>): ConstraintParseResult {
  const vocabulary: Record<string, unknown> = {};
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(info)) {
    if (VOCABULARY.has(key)) {
      vocabulary[key] = value;
    } else {
      extra[key] = value;
    }
  }

  const result = constraintsSchemaFor(kind).safeParse(vocabulary);
  if (result.success) {
    return { ok: true, constraints: result.data, extra };
  }

  const violations: ConstraintViolation[] = [];
  for (const issue of result.error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        violations.push({ key, reason: 'not-applicable', message: `does not apply to ${kind} fields` });
      }
    } else {
      violations.push({ key: issue.path.join('.'), reason: 'invalid-value', message: issue.message });
    }
  }
  return { ok: false, violations };
}
