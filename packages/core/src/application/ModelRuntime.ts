import type { z } from 'zod';
import type { FieldSpec } from '../domain/model/FieldSpec.js';
import type { ResolvedModelConfig } from '../domain/model/ModelConfig.js';
import { parseModelConfig } from '../domain/model/ModelConfig.js';
import type { ModelSpec } from '../domain/model/ModelSpec.js';
import type { ModelJsonSchema } from '../domain/services/JsonSchemaEmitter.js';
import { emitModelSchema } from '../domain/services/JsonSchemaEmitter.js';
import type { ValidationIssue } from '../domain/errors.js';
import { ModelValidationError, SchemaDefinitionError } from '../domain/errors.js';
import type { ModelRecord } from './ModelRecord.js';
import { defaultValue, fieldValidator } from './fieldValidators.js';

/** Validated field values of one instance, keyed by field name. */
export interface ModelState {
  readonly values: ReadonlyMap<string, unknown>;
  /** Input keys that matched no field, kept only under `extra: 'allow'`. */
  readonly extras: ReadonlyMap<string, unknown>;
}

export type ValidationOutcome =
  | { readonly ok: true; readonly state: ModelState }
  | { readonly ok: false; readonly error: ModelValidationError };

const ROOT = '__root__';

function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validation, defaults and schema of one synthesized model. Shared by all its instances. */
export class ModelRuntime {
  readonly config: ResolvedModelConfig;
  readonly fieldsByName: ReadonlyMap<string, FieldSpec>;
  private readonly validators: ReadonlyMap<string, z.ZodType<unknown>>;
  private cachedSchema: ModelJsonSchema | undefined;
  private factory: ((state: ModelState) => ModelRecord) | undefined;

  constructor(readonly spec: ModelSpec) {
    this.config = parseModelConfig(spec.config);
    this.fieldsByName = new Map(spec.fields.map((field) => [field.name, field]));
    this.validators = new Map(spec.fields.map((field) => [field.name, fieldValidator(field)]));
  }

  /** Validate keyword input, keyed by alias (and by field name under `populateByName`). */
  validateInput(input: unknown): ValidationOutcome {
    if (!isPlainRecord(input)) {
      return this.failure([{ field: ROOT, message: 'Expected an object', code: 'invalid_type' }]);
    }

    const byName: Record<string, unknown> = {};
    const consumed = new Set<string>();
    for (const field of this.spec.fields) {
      if (Object.hasOwn(input, field.alias)) {
        byName[field.name] = input[field.alias];
      } else if (this.config.populateByName && Object.hasOwn(input, field.name)) {
        byName[field.name] = input[field.name];
      }
      consumed.add(field.alias);
      if (this.config.populateByName) consumed.add(field.name);
    }

    const extras = new Map(Object.entries(input).filter(([key]) => !consumed.has(key)));
    const extraIssues: ValidationIssue[] =
      this.config.extra === 'forbid'
        ? [...extras.keys()].map((key) => ({ field: key, message: 'Extra inputs are not permitted', code: 'extra_forbidden' }))
        : [];

    return this.validateByName(byName, extraIssues, this.config.extra === 'allow' ? extras : new Map());
  }

  /** Validate the current attribute values of a live record instance. */
  validateRecord(record: object): ValidationOutcome {
    const byName: Record<string, unknown> = {};
    for (const field of this.spec.fields) {
      byName[field.name] = this.spec.readAttribute(record, field.name);
    }
    return this.validateByName(byName, [], new Map());
  }

  /** Validate a value assigned to one field. Throws {@link ModelValidationError}. */
  validateField(field: FieldSpec, value: unknown): unknown {
    const result = this.validatorFor(field).safeParse(value);
    if (!result.success) {
      throw new ModelValidationError(this.spec.name, this.toIssues(result.error, field.alias));
    }
    return result.data;
  }

  /** Build state without validation. Missing fields take their defaults; required ones stay unset. */
  construct(values: Readonly<Record<string, unknown>>): ModelState {
    const state = new Map<string, unknown>();
    for (const field of this.spec.fields) {
      if (Object.hasOwn(values, field.name)) {
        state.set(field.name, values[field.name]);
      } else if (field.default.kind !== 'required') {
        state.set(field.name, defaultValue(field.default));
      }
    }
    const extras =
      this.config.extra === 'allow'
        ? new Map(Object.entries(values).filter(([key]) => !this.fieldsByName.has(key)))
        : new Map<string, unknown>();
    return { values: state, extras };
  }

  /** Register how instances of the model class are built from prepared state. */
  bindFactory(factory: (state: ModelState) => ModelRecord): void {
    this.factory = factory;
  }

  create(state: ModelState): ModelRecord {
    if (!this.factory) {
      throw new SchemaDefinitionError(`Model ${this.spec.name} has no class bound to its runtime`);
    }
    return this.factory(state);
  }

  schema(): ModelJsonSchema {
    this.cachedSchema ??= emitModelSchema(this.spec, this.config.title);
    return this.cachedSchema;
  }

  private validateByName(
    byName: Readonly<Record<string, unknown>>,
    issues: readonly ValidationIssue[],
    extras: ReadonlyMap<string, unknown>,
  ): ValidationOutcome {
    const fieldIssues: ValidationIssue[] = [];
    const values = new Map<string, unknown>();
    for (const field of this.spec.fields) {
      const value = byName[field.name];
      if (value === undefined) {
        // Presence is checked here for every host type, JSON included.
        if (field.default.kind === 'required') {
          fieldIssues.push({ field: field.alias, message: 'Required', code: 'invalid_type' });
        } else {
          values.set(field.name, defaultValue(field.default));
        }
        continue;
      }
      const result = this.validatorFor(field).safeParse(value);
      if (result.success) {
        values.set(field.name, result.data);
      } else {
        fieldIssues.push(...this.toIssues(result.error, field.alias));
      }
    }

    if (fieldIssues.length > 0 || issues.length > 0) return this.failure([...fieldIssues, ...issues]);
    return { ok: true, state: { values, extras } };
  }

  private validatorFor(field: FieldSpec): z.ZodType<unknown> {
    const validator = this.validators.get(field.name);
    if (!validator) {
      throw new ModelValidationError(this.spec.name, [{ field: field.alias, message: 'Unknown field', code: 'unknown_field' }]);
    }
    return validator;
  }

  private toIssues(error: z.ZodError, alias: string): ValidationIssue[] {
    return error.issues.map((issue) => ({
      field: [alias, ...issue.path.map(String)].join('.'),
      message: issue.message,
      code: issue.code,
    }));
  }

  private failure(issues: readonly ValidationIssue[]): ValidationOutcome {
    return { ok: false, error: new ModelValidationError(this.spec.name, issues) };
  }
}
