export { SequelizeModelSource, describeModel, modelFrom } from './SequelizeModelSource.js';
export { column, enumColumn } from './columns.js';
export type { EnumColumnOptions, InfoColumnOptions } from './columns.js';
export { describeAttribute, pascalCase } from './mappers/AttributeMapper.js';
