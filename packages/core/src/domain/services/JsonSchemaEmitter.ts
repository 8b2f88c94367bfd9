import { JSON_SCHEMA_KEYWORDS, PASSTHROUGH_KEYS } from '../model/Constraints.js';
import type { EnumDefinition } from '../model/EnumType.js';
import type { FieldSpec } from '../model/FieldSpec.js';
import { isRequired } from '../model/FieldSpec.js';
import type { HostType } from '../model/HostType.js';
import type { ModelSpec } from '../model/ModelSpec.js';

/** JSON-Schema object for one property. */
export type PropertySchema = Readonly<Record<string, unknown>>;

/** Top-level JSON Schema of a synthesized model. */
export interface ModelJsonSchema {
  readonly title: string;
  readonly type: 'object';
  readonly properties: Readonly<Record<string, PropertySchema>>;
  readonly required?: readonly string[];
  readonly definitions?: Readonly<Record<string, EnumDefinition>>;
}

const DEFINITIONS_PREFIX = '#/definitions/';

/** `dynamic_column` → `Dynamic Column`, `totalRecords` → `Total Records`. */
export function titleCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function typeSchema(type: HostType): PropertySchema {
  switch (type.kind) {
    case 'integer':
    case 'number':
    case 'boolean':
      return { type: type.kind };
    case 'string':
      return type.format ? { type: 'string', format: type.format } : { type: 'string' };
    case 'datetime':
      return { type: 'string', format: 'date-time' };
    case 'date':
      return { type: 'string', format: 'date' };
    case 'time':
      return { type: 'string', format: 'time' };
    case 'json':
      return {};
    case 'enum':
      return { allOf: [{ $ref: `${DEFINITIONS_PREFIX}${type.enumType.name}` }] };
    case 'array':
      return { type: 'array', items: itemSchema(type.items) };
  }
}

function itemSchema(type: HostType): PropertySchema {
  return type.kind === 'enum' ? { $ref: `${DEFINITIONS_PREFIX}${type.enumType.name}` } : typeSchema(type);
}

function toJsonValue(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * JSON Schema of a single field.
 *
 * Referenced (enum) fields get no derived title. Only static, non-null
 * defaults are emitted; factories run per instance and have no fixed value.
 */
export function emitFieldSchema(field: FieldSpec): PropertySchema {
  const schema: Record<string, unknown> = {};
  const { constraints } = field;

  const title = constraints.title ?? (field.type.kind === 'enum' ? undefined : titleCase(field.alias));
  if (title !== undefined) schema['title'] = title;
  if (constraints.description !== undefined) schema['description'] = constraints.description;
  if (field.default.kind === 'value' && field.default.value !== null) {
    schema['default'] = toJsonValue(field.default.value);
  }

  for (const [key, keyword] of Object.entries(JSON_SCHEMA_KEYWORDS)) {
    const value: unknown = Reflect.get(constraints, key);
    if (value !== undefined) schema[keyword] = value;
  }
  for (const key of PASSTHROUGH_KEYS) {
    const value = constraints[key];
    if (value !== undefined) schema[key] = toJsonValue(value);
  }
  for (const [key, value] of Object.entries(field.extra)) {
    schema[key] = toJsonValue(value);
  }

  return { ...schema, ...typeSchema(field.type) };
}

/** JSON Schema of a whole model: properties in declaration order, keyed by alias. */
export function emitModelSchema(spec: ModelSpec, title: string = spec.name): ModelJsonSchema {
  const properties: Record<string, PropertySchema> = {};
  for (const field of spec.fields) {
    properties[field.alias] = emitFieldSchema(field);
  }

  const required = spec.fields.filter(isRequired).map((field) => field.alias);
  const definitions: Record<string, EnumDefinition> = {};
  for (const enumType of spec.enums) {
    definitions[enumType.name] = enumType.toDefinition();
  }

  return {
    title,
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    ...(spec.enums.length > 0 ? { definitions } : {}),
  };
}
