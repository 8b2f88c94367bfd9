import { Model } from 'sequelize';
import type { ModelStatic } from 'sequelize';
import { synthesizeModel } from '@rowmodel/core';
import type {
  ColumnDescriptor,
  ModelConfig,
  ModelValues,
  RecordModelSource,
  SynthesisOptions,
  ValidatedModel,
} from '@rowmodel/core';
import { describeAttribute } from './mappers/AttributeMapper.js';

/**
 * {@link RecordModelSource} backed by a Sequelize model class.
 *
 * Columns follow the model's attribute order, including the `id`,
 * timestamp and version attributes Sequelize adds itself.
 */
export class SequelizeModelSource implements RecordModelSource {
  readonly name: string;
  readonly columns: readonly ColumnDescriptor[];

  constructor(model: ModelStatic<Model>) {
    this.name = model.name;
    this.columns = Object.entries(model.getAttributes()).map(([name, attribute]) => describeAttribute(name, attribute));
  }

  readAttribute(record: object, column: string): unknown {
    return record instanceof Model ? record.get(column) : Reflect.get(record, column);
  }
}

export function describeModel(model: ModelStatic<Model>): RecordModelSource {
  return new SequelizeModelSource(model);
}

/**
 * Derive a validated model class from a Sequelize model.
 *
 * @example
 * const Person = sequelize.define('Person', {
 *   id: { type: DataTypes.INTEGER, primaryKey: true },
 *   age: column({ type: DataTypes.INTEGER }, { ge: 0 }),
 * });
 * const PersonModel = modelFrom(Person);
 * const row = await Person.findByPk(1);
 * if (row) PersonModel.fromRecord(row);
 */
export function modelFrom<T extends object = ModelValues>(
  model: ModelStatic<Model>,
  config?: ModelConfig,
  options?: SynthesisOptions,
): ValidatedModel<T> {
  return synthesizeModel<T>(describeModel(model), config, options);
}
