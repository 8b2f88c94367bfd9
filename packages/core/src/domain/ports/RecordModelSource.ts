import type { ColumnDescriptor } from '../model/ColumnDescriptor.js';

/**
 * Port through which a record-model framework exposes a model class.
 *
 * Implement this to synthesize validated models from an ORM other than the
 * bundled adapters.
 */
export interface RecordModelSource {
  /** Name of the record-model class; becomes the synthesized model's name. */
  readonly name: string;
  /** Columns in the framework's declaration order. */
  readonly columns: readonly ColumnDescriptor[];
  /**
   * Read a column's current value off a live record instance.
   * Defaults to plain property access.
   */
  readAttribute?(record: object, column: string): unknown;
}

/** Build a source from hand-written column descriptors. */
export function recordModel(name: string, columns: readonly ColumnDescriptor[]): RecordModelSource {
  return { name, columns };
}
