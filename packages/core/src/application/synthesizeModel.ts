import type { ModelConfig } from '../domain/model/ModelConfig.js';
import type { RecordModelSource } from '../domain/ports/RecordModelSource.js';
import type { SynthesisOptions } from './ModelSynthesizer.js';
import { buildModelSpec } from './ModelSynthesizer.js';
import type { ModelValues, ValidatedModel } from './defineModel.js';
import { defineModel } from './defineModel.js';

/**
 * Derive a validated model class from a record model.
 *
 * @example
 * const PersonModel = synthesizeModel<{ id: number | null; name: string }>(
 *   recordModel('Person', [
 *     describeColumn('id', 'INTEGER', { primaryKey: true }),
 *     describeColumn('name', { key: 'STRING', length: 40 }, { nullable: false }),
 *   ]),
 * );
 * PersonModel.parse({ id: 1, name: 'Ada' });
 */
export function synthesizeModel<T extends object = ModelValues>(
  source: RecordModelSource,
  config?: ModelConfig,
  options: SynthesisOptions = {},
): ValidatedModel<T> {
  return defineModel<T>(buildModelSpec(source, config, options));
}
