import type { FieldSpec } from '../domain/model/FieldSpec.js';
import { ImmutableFieldError } from '../domain/errors.js';
import type { ModelRuntime, ModelState } from './ModelRuntime.js';

export interface DictOptions {
  /** Key the result by alias instead of field name. */
  readonly byAlias?: boolean;
  /** Field names to leave out. */
  readonly exclude?: readonly string[];
}

/**
 * Base class of every synthesized model.
 *
 * Field values live in private state and are reached through accessors
 * installed on the subclass prototype, one per field.
 */
export class ModelRecord {
  readonly #runtime: ModelRuntime;
  readonly #values: Map<string, unknown>;
  readonly #extras: Map<string, unknown>;

  protected constructor(runtime: ModelRuntime, state: ModelState) {
    this.#runtime = runtime;
    this.#values = new Map(state.values);
    this.#extras = new Map(state.extras);
    Object.preventExtensions(this);
  }

  /** Field values as a plain object, in declaration order. Extras kept under `extra: 'allow'` come last. */
  dict(options: DictOptions = {}): Record<string, unknown> {
    const excluded = new Set(options.exclude ?? []);
    const result: Record<string, unknown> = {};
    for (const field of this.#runtime.spec.fields) {
      if (excluded.has(field.name) || !this.#values.has(field.name)) continue;
      result[options.byAlias ? field.alias : field.name] = this.#values.get(field.name);
    }
    for (const [key, value] of this.#extras) {
      if (!excluded.has(key)) result[key] = value;
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return this.dict();
  }

  /**
   * A new instance of the same model with `update` applied by field name.
   * The update is not validated.
   */
  copy(update: Readonly<Record<string, unknown>> = {}): ModelRecord {
    const values: Record<string, unknown> = { ...this.dict(), ...update };
    return this.#runtime.create(this.#runtime.construct(values));
  }

  toString(): string {
    const parts = this.#runtime.spec.fields
      .filter((field) => this.#values.has(field.name))
      .map((field) => `${field.name}=${formatValue(this.#values.get(field.name))}`);
    return `${this.#runtime.spec.name}(${parts.join(', ')})`;
  }

  #assign(field: FieldSpec, value: unknown): void {
    const runtime = this.#runtime;
    if (runtime.config.frozen) {
      throw new ImmutableFieldError(runtime.spec.name, field.alias);
    }
    if (!runtime.config.validateAssignment) {
      this.#values.set(field.name, value);
      return;
    }
    if (field.constraints.allowMutation === false) {
      throw new ImmutableFieldError(runtime.spec.name, field.alias);
    }
    this.#values.set(field.name, runtime.validateField(field, value));
  }

  /**
   * Install one enumerable accessor per field on a model prototype.
   * @internal
   */
  static defineAccessors(prototype: ModelRecord, fields: readonly FieldSpec[]): void {
    for (const field of fields) {
      Object.defineProperty(prototype, field.name, {
        enumerable: true,
        configurable: false,
        get(this: ModelRecord): unknown {
          return this.#values.get(field.name);
        },
        set(this: ModelRecord, value: unknown): void {
          this.#assign(field, value);
        },
      });
    }
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return typeof value === 'string' ? `'${value}'` : String(JSON.stringify(value));
}
