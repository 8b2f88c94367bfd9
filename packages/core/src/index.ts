// Main entry point
export { synthesizeModel } from './application/synthesizeModel.js';
export { defineModel } from './application/defineModel.js';
export type {
  ModelInstance,
  ModelMethods,
  ModelValues,
  SafeParseResult,
  ValidatedModel,
} from './application/defineModel.js';
export { ModelRecord } from './application/ModelRecord.js';
export type { DictOptions } from './application/ModelRecord.js';

// Domain model
export type { ColumnDescriptor, ColumnDefault, DescribeColumnOptions, StorageType } from './domain/model/ColumnDescriptor.js';
export { describeColumn, toColumnDefault, NO_DEFAULT } from './domain/model/ColumnDescriptor.js';
export type {
  CommonConstraints,
  ConstraintKey,
  ConstraintParseResult,
  ConstraintViolation,
  FieldConstraints,
  FieldInfo,
  NumericConstraints,
  SequenceConstraints,
  StringConstraints,
} from './domain/model/Constraints.js';
export { JSON_SCHEMA_KEYWORDS, PASSTHROUGH_KEYS, VOCABULARY, parseConstraints } from './domain/model/Constraints.js';
export type { EnumMember, EnumValue } from './domain/model/EnumSource.js';
export { EnumSource, defineEnum } from './domain/model/EnumSource.js';
export type { EnumDefinition } from './domain/model/EnumType.js';
export { EnumType } from './domain/model/EnumType.js';
export type { FieldDefault, FieldSpec } from './domain/model/FieldSpec.js';
export { REQUIRED, isRequired } from './domain/model/FieldSpec.js';
export type { ConstraintKind, HostType, ScalarHostType } from './domain/model/HostType.js';
export { constraintKindOf, describeHostType } from './domain/model/HostType.js';
export type { ExtraPolicy, ModelConfig, ResolvedModelConfig } from './domain/model/ModelConfig.js';
export { parseModelConfig } from './domain/model/ModelConfig.js';
export type { AttributeReader, ModelSpec } from './domain/model/ModelSpec.js';
export { readProperty } from './domain/model/ModelSpec.js';

// Domain services (for building custom synthesis pipelines)
export { EnumRegistry } from './domain/services/EnumRegistry.js';
export { synthesizeField, SUPPORTED_STORAGE_KEYS } from './domain/services/FieldSynthesizer.js';
export { buildModelSpec } from './application/ModelSynthesizer.js';
export type { SynthesisOptions } from './application/ModelSynthesizer.js';
export { emitFieldSchema, emitModelSchema, titleCase } from './domain/services/JsonSchemaEmitter.js';
export type { ModelJsonSchema, PropertySchema } from './domain/services/JsonSchemaEmitter.js';

// Errors
export {
  ErrorCode,
  RowModelError,
  UnsupportedTypeError,
  ConstraintConflictError,
  InvalidConstraintError,
  SchemaDefinitionError,
  ModelValidationError,
  ImmutableFieldError,
  ConfigError,
} from './domain/errors.js';
export type { ValidationIssue } from './domain/errors.js';

// Events
export { EventBus } from './application/EventBus.js';
export type {
  FieldSynthesizedEvent,
  ModelSynthesizedEvent,
  SynthesisFailedEvent,
  SynthesisEvent,
  SynthesisEventType,
  SynthesisEventPayload,
} from './domain/events/SynthesisEvents.js';

// Ports (for custom implementations)
export type { RecordModelSource } from './domain/ports/RecordModelSource.js';
export { recordModel } from './domain/ports/RecordModelSource.js';
export type { Logger, LogLevel } from './domain/ports/Logger.js';

// Infrastructure
export { StderrLogger, createLogger, resolveLogLevel, defaultLogger } from './infrastructure/logging/StderrLogger.js';
export type { StderrLoggerConfig } from './infrastructure/logging/StderrLogger.js';
