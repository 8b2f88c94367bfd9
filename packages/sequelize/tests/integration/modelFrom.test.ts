import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DataTypes, Sequelize } from 'sequelize';
import type { ModelStatic, Model } from 'sequelize';
import { ModelValidationError, defineEnum } from '@rowmodel/core';
import { SQLite3Wrapper } from '../better-sqlite3-adapter.js';
import { modelFrom } from '../../src/SequelizeModelSource.js';
import { column, enumColumn } from '../../src/columns.js';
import fs from 'fs';
import path from 'path';
import os from 'os';

interface Person {
  id: number | null;
  age: number;
  name: string;
}

interface Ticket {
  id: number | null;
  status: 'open' | 'closed';
  priority: number | null;
}

const Status = defineEnum('Status', { OPEN: 'open', CLOSED: 'closed' });

describe('modelFrom', () => {
  let sequelize: Sequelize;
  let dbPath: string;
  let PersonRow: ModelStatic<Model>;
  let TicketRow: ModelStatic<Model>;

  beforeEach(async () => {
    dbPath = path.join(os.tmpdir(), `test-rowmodel-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = new Sequelize({
      dialect: 'sqlite',
      storage: dbPath,
      logging: false,
      dialectModule: { Database: SQLite3Wrapper },
      pool: {
        max: 1,
        min: 1,
        idle: 30000,
        acquire: 60000,
        evict: 30000,
      },
    });

    PersonRow = sequelize.define(
      'PersonDB',
      {
        id: { type: DataTypes.INTEGER, primaryKey: true, autoIncrement: true },
        age: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0, comment: 'Age in years' },
        name: { type: DataTypes.STRING(128), allowNull: false, comment: 'Full name' },
      },
      { tableName: 'people', timestamps: false },
    );
    TicketRow = sequelize.define(
      'Ticket',
      {
        id: { type: DataTypes.INTEGER, primaryKey: true, autoIncrement: true },
        status: enumColumn(Status, { allowNull: false, defaultValue: 'open' }),
        priority: column({ type: DataTypes.INTEGER }, { ge: 1, le: 5 }),
      },
      { tableName: 'tickets', timestamps: false },
    );
    await sequelize.sync();
  });

  afterEach(async () => {
    try {
      await sequelize.close();
    } catch {
      // ignore
    }
    try {
      if (fs.existsSync(dbPath)) {
        fs.unlinkSync(dbPath);
      }
    } catch {
      // ignore
    }
  });

  it('should describe the table as a JSON schema', () => {
    const PersonModel = modelFrom<Person>(PersonRow);

    expect(PersonModel.name).toBe('PersonDB');
    expect(PersonModel.schema()).toEqual({
      title: 'PersonDB',
      type: 'object',
      properties: {
        id: { title: 'Id', type: 'integer' },
        age: { title: 'Age', description: 'Age in years', default: 0, type: 'integer' },
        name: { title: 'Name', description: 'Full name', maxLength: 128, type: 'string' },
      },
      required: ['id', 'name'],
    });
  });

  it('should round trip a row through the model', async () => {
    const PersonModel = modelFrom<Person>(PersonRow);
    const draft = PersonModel.construct({ name: 'Someone', age: 25 });

    expect(draft.dict()).toEqual({ age: 25, name: 'Someone' });

    await PersonRow.create(draft.dict());
    const row = await PersonRow.findOne({ rejectOnEmpty: true });
    const person = PersonModel.fromRecord(row);

    expect(person.dict()).toEqual({ id: 1, age: 25, name: 'Someone' });
    expect(String(person)).toBe("PersonDB(id=1, age=25, name='Someone')");
  });

  it('should reject a row that breaks a column length', async () => {
    const PersonModel = modelFrom<Person>(PersonRow);
    await PersonRow.create({ name: 'x'.repeat(129), age: 30 });
    const row = await PersonRow.findOne({ rejectOnEmpty: true });

    expect(() => PersonModel.fromRecord(row)).toThrow(ModelValidationError);
    expect(() => PersonModel.fromRecord(row)).toThrow('name: String must contain at most 128 character(s)');
  });

  it('should share the declared enumeration and apply column info', async () => {
    const TicketModel = modelFrom<Ticket>(TicketRow);

    expect(TicketModel.schema()).toEqual({
      title: 'Ticket',
      type: 'object',
      properties: {
        id: { title: 'Id', type: 'integer' },
        status: { default: 'open', allOf: [{ $ref: '#/definitions/Status' }] },
        priority: { title: 'Priority', minimum: 1, maximum: 5, type: 'integer' },
      },
      required: ['id'],
      definitions: {
        Status: { title: 'Status', description: 'An enumeration.', enum: ['open', 'closed'], type: 'string' },
      },
    });

    await TicketRow.create({ priority: 3 });
    const ticket = TicketModel.fromRecord(await TicketRow.findOne({ rejectOnEmpty: true }));

    expect(ticket.status).toBe('open');
    expect(ticket.priority).toBe(3);
    expect(() => new TicketModel({ id: 2, priority: 9 })).toThrow('priority: Number must be less than or equal to 5');
  });
});
