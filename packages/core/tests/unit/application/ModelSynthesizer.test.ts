import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import { describeColumn } from '../../../src/domain/model/ColumnDescriptor.js';
import { defineEnum } from '../../../src/domain/model/EnumSource.js';
import { readProperty } from '../../../src/domain/model/ModelSpec.js';
import type { Logger } from '../../../src/domain/ports/Logger.js';
import { recordModel } from '../../../src/domain/ports/RecordModelSource.js';
import type { RecordModelSource } from '../../../src/domain/ports/RecordModelSource.js';
import { buildModelSpec } from '../../../src/application/ModelSynthesizer.js';
import { SchemaDefinitionError, UnsupportedTypeError } from '../../../src/domain/errors.js';

function createLogger() {
  const warn = vi.fn();
  const debug = vi.fn();
  const logger: Logger = { error: vi.fn(), warn, info: vi.fn(), debug };
  return { logger, warn, debug };
}

describe('buildModelSpec', () => {
  it('should synthesize every column in declaration order', () => {
    const spec = buildModelSpec(
      recordModel('Person', [
        describeColumn('id', 'INTEGER', { primaryKey: true }),
        describeColumn('name', { key: 'STRING', length: 40 }, { nullable: false }),
        describeColumn('age', 'INTEGER', { info: { ge: 0 } }),
      ]),
    );

    expect(spec.name).toBe('Person');
    expect(spec.fields.map((f) => f.name)).toEqual(['id', 'name', 'age']);
    expect(spec.enums).toEqual([]);
    expect(spec.readAttribute).toBe(readProperty);
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('should carry the model config through untouched', () => {
    const config = { validateAssignment: true };
    const spec = buildModelSpec(recordModel('Person', [describeColumn('id', 'INTEGER')]), config);

    expect(spec.config).toBe(config);
  });

  it('should omit config when none is given', () => {
    const spec = buildModelSpec(recordModel('Person', [describeColumn('id', 'INTEGER')]));

    expect('config' in spec).toBe(false);
  });

  it('should share one enum type between columns of the same enumeration', () => {
    const Bool = defineEnum('Bool', { FALSE: 'F', TRUE: 'T' });
    const spec = buildModelSpec(
      recordModel('Flags', [
        describeColumn('a', { key: 'ENUM', enumSource: Bool }),
        describeColumn('b', { key: 'ENUM', enumSource: Bool }),
      ]),
    );

    expect(spec.enums).toHaveLength(1);
    expect(spec.enums[0]?.name).toBe('Bool');
  });

  it('should build fresh enum types on every run', () => {
    const Bool = defineEnum('Bool', { FALSE: 'F', TRUE: 'T' });
    const source = recordModel('Flags', [describeColumn('a', { key: 'ENUM', enumSource: Bool })]);

    expect(buildModelSpec(source).enums[0]).not.toBe(buildModelSpec(source).enums[0]);
  });

  it('should stop at the first failing column', () => {
    const bus = new EventBus();
    const fields = vi.fn();
    const failed = vi.fn();
    bus.on('field:synthesized', fields);
    bus.on('synthesis:failed', failed);

    const source = recordModel('Broken', [
      describeColumn('ok', 'INTEGER'),
      describeColumn('shape', 'GEOMETRY'),
      describeColumn('never', 'INTEGER'),
    ]);

    expect(() => buildModelSpec(source, undefined, { events: bus })).toThrow(UnsupportedTypeError);
    expect(fields).toHaveBeenCalledOnce();
    expect(failed).toHaveBeenCalledOnce();
    expect(failed.mock.calls[0]?.[0]).toMatchObject({
      type: 'synthesis:failed',
      model: 'Broken',
      column: 'shape',
      error: "Column 'shape' has unsupported storage type 'GEOMETRY'",
    });
  });

  it('should emit model:synthesized with field and enum counts', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('model:synthesized', handler);

    buildModelSpec(recordModel('Person', [describeColumn('id', 'INTEGER'), describeColumn('name', 'TEXT')]), undefined, {
      events: bus,
    });

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ model: 'Person', fieldCount: 2, enumCount: 0 });
  });

  it('should reject an alias that collides with another field', () => {
    const source = recordModel('Clash', [
      describeColumn('text', 'TEXT'),
      describeColumn('string', 'TEXT', { info: { alias: 'text' } }),
    ]);

    expect(() => buildModelSpec(source)).toThrow(SchemaDefinitionError);
    expect(() => buildModelSpec(source)).toThrow(
      "Field 'string' of Clash uses the name 'text', already taken by field 'text'",
    );
  });

  it('should warn about info keys outside the vocabulary', () => {
    const { logger, warn } = createLogger();

    buildModelSpec(recordModel('Person', [describeColumn('age', 'INTEGER', { info: { unit: 'years' } })]), undefined, {
      logger,
    });

    expect(warn).toHaveBeenCalledWith("Column 'age' of Person carries info outside the constraint vocabulary", {
      keys: ['unit'],
    });
  });

  it('should log one debug line per field', () => {
    const { logger, debug } = createLogger();

    buildModelSpec(recordModel('Person', [describeColumn('id', 'INTEGER', { primaryKey: true })]), undefined, {
      logger,
    });

    expect(debug).toHaveBeenCalledWith('Synthesized Person.id', { kind: 'integer', alias: 'id', required: true });
  });

  it('should bind a custom attribute reader to its source', () => {
    const source: RecordModelSource & { prefix: string } = {
      name: 'Row',
      prefix: 'col_',
      columns: [describeColumn('id', 'INTEGER')],
      readAttribute(record, column) {
        return Reflect.get(record, this.prefix + column);
      },
    };

    const spec = buildModelSpec(source);

    expect(spec.readAttribute({ col_id: 4 }, 'id')).toBe(4);
  });
});
