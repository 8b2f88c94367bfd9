import type { FieldSpec } from '../domain/model/FieldSpec.js';
import type { ResolvedModelConfig } from '../domain/model/ModelConfig.js';
import type { ModelSpec } from '../domain/model/ModelSpec.js';
import type { ModelJsonSchema } from '../domain/services/JsonSchemaEmitter.js';
import type { ModelValidationError } from '../domain/errors.js';
import { SchemaDefinitionError } from '../domain/errors.js';
import type { DictOptions } from './ModelRecord.js';
import { ModelRecord } from './ModelRecord.js';
import type { ModelState, ValidationOutcome } from './ModelRuntime.js';
import { ModelRuntime } from './ModelRuntime.js';

/** Field values of a model instance, keyed by field name. */
export type ModelValues = Record<string, unknown>;

export interface ModelMethods<T extends object> {
  dict(options?: DictOptions): Record<string, unknown>;
  toJSON(): Record<string, unknown>;
  copy(update?: Readonly<Partial<T>>): ModelInstance<T>;
  toString(): string;
}

/** An instance of a synthesized model: its fields plus the {@link ModelRecord} methods. */
export type ModelInstance<T extends object = ModelValues> = T & ModelMethods<T>;

export type SafeParseResult<R> =
  | { readonly success: true; readonly data: R }
  | { readonly success: false; readonly error: ModelValidationError };

/**
 * A synthesized model class.
 *
 * `new Model(input)` and `Model.parse(input)` validate keyword input keyed by
 * alias and throw {@link ModelValidationError} on failure.
 */
export interface ValidatedModel<T extends object = ModelValues> {
  new (input?: Readonly<Record<string, unknown>>): ModelInstance<T>;
  readonly name: string;
  readonly spec: ModelSpec;
  readonly config: ResolvedModelConfig;
  readonly fields: readonly FieldSpec[];
  parse(input: unknown): ModelInstance<T>;
  safeParse(input: unknown): SafeParseResult<ModelInstance<T>>;
  /** Build an instance from values keyed by field name, without validation. */
  construct(values?: Readonly<Partial<T>>): ModelInstance<T>;
  /** Validate the current values of a live record-model instance. */
  fromRecord(record: object): ModelInstance<T>;
  schema(): ModelJsonSchema;
  schemaJson(indent?: number): string;
}

/** Marks state that has already been validated or deliberately left unvalidated. */
class PreparedState {
  constructor(readonly state: ModelState) {}
}

function unwrap(outcome: ValidationOutcome): ModelState {
  if (!outcome.ok) throw outcome.error;
  return outcome.state;
}

function assertNoReservedNames(spec: ModelSpec): void {
  for (const field of spec.fields) {
    if (field.name in ModelRecord.prototype) {
      throw new SchemaDefinitionError(
        `Field '${field.name}' of ${spec.name} collides with a built-in model member`,
        { model: spec.name, field: field.name },
      );
    }
  }
}

function hasFieldAccessors<T extends object>(model: object, fields: readonly FieldSpec[]): model is ValidatedModel<T> {
  const prototype: unknown = Reflect.get(model, 'prototype');
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    fields.every((field) => Object.getOwnPropertyDescriptor(prototype, field.name)?.get !== undefined)
  );
}

/**
 * Build a validated model class from a model specification.
 *
 * `T` declares the field shape for the type checker; the runtime shape comes
 * from `spec` alone.
 *
 * @throws SchemaDefinitionError when a field name collides with a model method
 * @throws ConfigError when `spec.config` is malformed
 */
export function defineModel<T extends object = ModelValues>(spec: ModelSpec): ValidatedModel<T> {
  assertNoReservedNames(spec);
  const runtime = new ModelRuntime(spec);

  class Model extends ModelRecord {
    static readonly spec = spec;
    static readonly config = runtime.config;
    static readonly fields = spec.fields;

    constructor(input: Readonly<Record<string, unknown>> = {}, prepared?: PreparedState) {
      super(runtime, prepared instanceof PreparedState ? prepared.state : unwrap(runtime.validateInput(input)));
    }

    static parse(input: unknown): Model {
      return new Model({}, new PreparedState(unwrap(runtime.validateInput(input))));
    }

    static safeParse(input: unknown): SafeParseResult<Model> {
      const outcome = runtime.validateInput(input);
      return outcome.ok
        ? { success: true, data: new Model({}, new PreparedState(outcome.state)) }
        : { success: false, error: outcome.error };
    }

    static construct(values: Readonly<Record<string, unknown>> = {}): Model {
      return new Model({}, new PreparedState(runtime.construct(values)));
    }

    static fromRecord(record: object): Model {
      return new Model({}, new PreparedState(unwrap(runtime.validateRecord(record))));
    }

    static schema(): ModelJsonSchema {
      return runtime.schema();
    }

    static schemaJson(indent = 2): string {
      return JSON.stringify(runtime.schema(), null, indent);
    }
  }

  Object.defineProperty(Model, 'name', { value: spec.name });
  ModelRecord.defineAccessors(Model.prototype, spec.fields);
  runtime.bindFactory((state) => new Model({}, new PreparedState(state)));

  const model: object = Model;
  if (!hasFieldAccessors<T>(model, spec.fields)) {
    throw new SchemaDefinitionError(`Could not install field accessors on ${spec.name}`, { model: spec.name });
  }
  return model;
}
