import { z } from 'zod';
import { InvalidConstraintError } from '@rowmodel/core';

const infoSchema = z.record(z.string(), z.unknown());

/**
 * Read the `info` bag of a column attribute.
 *
 * Attribute definitions loaded from JSON files may carry it as a string, so
 * both an object and its JSON text are accepted.
 */
export function readInfo(column: string, value: unknown): Readonly<Record<string, unknown>> {
  if (value === undefined || value === null) return {};

  let parsed: unknown = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(value);
    } catch (error) {
      throw new InvalidConstraintError(column, `Info of column '${column}' is not valid JSON`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const result = infoSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidConstraintError(column, `Info of column '${column}' must be an object`);
  }
  return result.data;
}
