import type { EventBus } from './EventBus.js';
import type { FieldSpec } from '../domain/model/FieldSpec.js';
import { isRequired } from '../domain/model/FieldSpec.js';
import type { ModelConfig } from '../domain/model/ModelConfig.js';
import type { ModelSpec } from '../domain/model/ModelSpec.js';
import { readProperty } from '../domain/model/ModelSpec.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { RecordModelSource } from '../domain/ports/RecordModelSource.js';
import { defaultLogger } from '../infrastructure/logging/StderrLogger.js';
import { SchemaDefinitionError } from '../domain/errors.js';
import { EnumRegistry } from '../domain/services/EnumRegistry.js';
import { synthesizeField } from '../domain/services/FieldSynthesizer.js';

export interface SynthesisOptions {
  /** Receives `field:synthesized`, `model:synthesized` and `synthesis:failed`. */
  readonly events?: EventBus;
  readonly logger?: Logger;
}

function assertDistinctNames(model: string, fields: readonly FieldSpec[]): void {
  const owners = new Map<string, string>();
  for (const field of fields) {
    for (const key of new Set([field.name, field.alias])) {
      const owner = owners.get(key);
      if (owner !== undefined && owner !== field.name) {
        throw new SchemaDefinitionError(
          `Field '${field.name}' of ${model} uses the name '${key}', already taken by field '${owner}'`,
          { model, field: field.name, name: key },
        );
      }
      owners.set(key, field.name);
    }
  }
}

/**
 * Synthesize every column of a record model, in declaration order.
 *
 * Fails fast: the first column error aborts synthesis and propagates
 * unchanged. `config` is carried through untouched.
 */
export function buildModelSpec(
  source: RecordModelSource,
  config?: ModelConfig,
  options: SynthesisOptions = {},
): ModelSpec {
  const logger = options.logger ?? defaultLogger;
  const enums = new EnumRegistry();
  const fields: FieldSpec[] = [];
  let current: string | undefined;

  try {
    for (const column of source.columns) {
      current = column.name;
      const field = synthesizeField(column, enums);
      fields.push(field);

      const passthrough = Object.keys(field.extra);
      if (passthrough.length > 0) {
        logger.warn(`Column '${column.name}' of ${source.name} carries info outside the constraint vocabulary`, {
          keys: passthrough,
        });
      }
      logger.debug(`Synthesized ${source.name}.${field.name}`, {
        kind: field.type.kind,
        alias: field.alias,
        required: isRequired(field),
      });
      options.events?.emit({
        type: 'field:synthesized',
        model: source.name,
        field: field.name,
        alias: field.alias,
        kind: field.type.kind,
        required: isRequired(field),
        timestamp: Date.now(),
      });
    }
    current = undefined;
    assertDistinctNames(source.name, fields);
  } catch (error) {
    logger.debug(`Synthesis of ${source.name} failed`, {
      column: current,
      error: error instanceof Error ? error.message : String(error),
    });
    options.events?.emit({
      type: 'synthesis:failed',
      model: source.name,
      ...(current !== undefined ? { column: current } : {}),
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
    throw error;
  }

  const spec: ModelSpec = Object.freeze({
    name: source.name,
    fields: Object.freeze(fields),
    enums: Object.freeze(enums.types),
    ...(config !== undefined ? { config } : {}),
    readAttribute: source.readAttribute ? source.readAttribute.bind(source) : readProperty,
  });

  options.events?.emit({
    type: 'model:synthesized',
    model: spec.name,
    fieldCount: spec.fields.length,
    enumCount: spec.enums.length,
    timestamp: Date.now(),
  });
  return spec;
}
