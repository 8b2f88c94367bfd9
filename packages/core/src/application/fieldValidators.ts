import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';
import type { FieldConstraints } from '../domain/model/Constraints.js';
import type { EnumType } from '../domain/model/EnumType.js';
import type { FieldDefault, FieldSpec } from '../domain/model/FieldSpec.js';
import type { HostType } from '../domain/model/HostType.js';

function numeric(schema: z.ZodNumber, c: FieldConstraints): z.ZodNumber {
  let result = schema;
  if (c.ge !== undefined) result = result.gte(c.ge);
  if (c.gt !== undefined) result = result.gt(c.gt);
  if (c.le !== undefined) result = result.lte(c.le);
  if (c.lt !== undefined) result = result.lt(c.lt);
  if (c.multipleOf !== undefined) result = result.multipleOf(c.multipleOf);
  return result;
}

const INTEGER_TEXT = /^-?\d+$/;
const DECIMAL_TEXT = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

/** Numbers, bigints and numeric text, checked by numeric value and kept as given. */
function lossless(schema: z.ZodNumber, pattern: RegExp): z.ZodType<unknown> {
  return z.unknown().superRefine((value, ctx) => {
    if (typeof value === 'string' && !pattern.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid numeric string '${value}'` });
      return;
    }
    const result = schema.safeParse(typeof value === 'string' || typeof value === 'bigint' ? Number(value) : value);
    if (!result.success) {
      for (const issue of result.error.issues) ctx.addIssue(issue);
    }
  });
}

function text(schema: z.ZodString, c: FieldConstraints): z.ZodString {
  let result = schema;
  if (c.minLength !== undefined) result = result.min(c.minLength);
  if (c.maxLength !== undefined) result = result.max(c.maxLength);
  if (c.regex !== undefined) result = result.regex(new RegExp(c.regex));
  return result;
}

function enumeration(enumType: EnumType): z.ZodType<unknown> {
  const expected = enumType.values.map((v) => JSON.stringify(v)).join(', ');
  return z.custom((value: unknown) => enumType.has(value), {
    message: `Value must be one of ${expected}`,
  });
}

/** Validator for a host type, with the field's constraints applied at the top level only. */
export function hostTypeValidator(type: HostType, c: FieldConstraints = {}): z.ZodType<unknown> {
  switch (type.kind) {
    case 'integer':
      return type.lossless ? lossless(numeric(z.number().int(), c), INTEGER_TEXT) : numeric(z.number().int(), c);
    case 'number':
      return type.lossless ? lossless(numeric(z.number(), c), DECIMAL_TEXT) : numeric(z.number(), c);
    case 'string':
      return text(type.format === 'uuid' ? z.string().uuid() : z.string(), c);
    case 'boolean':
      return z.boolean();
    case 'datetime':
      return z.coerce.date();
    case 'date':
      return z.string().date();
    case 'time':
      return z.string().time();
    case 'json':
      return z.unknown();
    case 'enum':
      return enumeration(type.enumType);
    case 'array': {
      let schema = z.array(hostTypeValidator(type.items));
      if (c.minItems !== undefined) schema = schema.min(c.minItems);
      if (c.maxItems !== undefined) schema = schema.max(c.maxItems);
      return schema;
    }
  }
}

/** Produce the value a default stands for. Static values are copied so instances never share them. */
export function defaultValue(fieldDefault: Exclude<FieldDefault, { kind: 'required' }>): unknown {
  return fieldDefault.kind === 'factory' ? fieldDefault.factory() : structuredClone(fieldDefault.value);
}

/**
 * Validator for one field value: type, constraints, `const` and nullability.
 *
 * Defaults are not part of it. A missing value takes the default unvalidated.
 */
export function fieldValidator(field: FieldSpec): z.ZodType<unknown> {
  let schema = hostTypeValidator(field.type, field.constraints);

  const expected = field.constraints.const;
  if (expected !== undefined) {
    schema = schema.refine((value) => isDeepStrictEqual(value, expected), {
      message: `Value must be ${JSON.stringify(expected)}`,
    });
  }
  return field.optional ? schema.nullable() : schema;
}
