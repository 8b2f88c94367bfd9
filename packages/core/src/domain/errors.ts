/** Machine-readable codes carried by every rowmodel error. */
export enum ErrorCode {
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  CONSTRAINT_CONFLICT = 'CONSTRAINT_CONFLICT',
  INVALID_CONSTRAINT = 'INVALID_CONSTRAINT',
  SCHEMA_DEFINITION = 'SCHEMA_DEFINITION',
  MODEL_VALIDATION = 'MODEL_VALIDATION',
  IMMUTABLE_FIELD = 'IMMUTABLE_FIELD',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/** Base class for errors raised while synthesizing or using a model. */
export class RowModelError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RowModelError';
  }

  /** Plain object form, suitable for logging or an API error body. */
  toResponse(phase: string) {
    return {
      status: 'error',
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/** A column's storage type has no mapping rule. */
export class UnsupportedTypeError extends RowModelError {
  constructor(
    public readonly column: string,
    public readonly storageKey: string,
  ) {
    super(ErrorCode.UNSUPPORTED_TYPE, `Column '${column}' has unsupported storage type '${storageKey}'`, {
      column,
      storageKey,
    });
    this.name = 'UnsupportedTypeError';
  }
}

/** The column type and the column metadata declare different values for the same constraint. */
export class ConstraintConflictError extends RowModelError {
  constructor(
    public readonly column: string,
    public readonly key: string,
    public readonly intrinsic: number,
    public readonly declared: number,
  ) {
    super(
      ErrorCode.CONSTRAINT_CONFLICT,
      `${key} (${String(declared)}) differs from length set for column type (${String(intrinsic)}).` +
        ` Either remove ${key} from info (preferred) or set them to equal values`,
      { column, key, intrinsic, declared },
    );
    this.name = 'ConstraintConflictError';
  }
}

/** A vocabulary constraint does not apply to the column's kind, or its value is malformed. */
export class InvalidConstraintError extends RowModelError {
  constructor(
    public readonly column: string,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(ErrorCode.INVALID_CONSTRAINT, message, { column, ...details });
    this.name = 'InvalidConstraintError';
  }
}

/** The record model itself is malformed (empty enum, clashing names, reserved field names). */
export class SchemaDefinitionError extends RowModelError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(ErrorCode.SCHEMA_DEFINITION, message, details);
    this.name = 'SchemaDefinitionError';
  }
}

/** A single failed check reported by the model runtime. */
export interface ValidationIssue {
  /** Property name as exposed by the model (the alias when one is set). */
  readonly field: string;
  readonly message: string;
  readonly code: string;
}

/** Input given to a synthesized model failed validation. */
export class ModelValidationError extends RowModelError {
  constructor(
    public readonly model: string,
    public readonly issues: readonly ValidationIssue[],
  ) {
    super(
      ErrorCode.MODEL_VALIDATION,
      `${String(issues.length)} validation error${issues.length === 1 ? '' : 's'} for ${model}\n` +
        issues.map((issue) => `${issue.field}: ${issue.message}`).join('\n'),
      { model, issues },
    );
    this.name = 'ModelValidationError';
  }
}

/** Assignment to a field declared with `allowMutation: false`, or to a frozen model. */
export class ImmutableFieldError extends RowModelError {
  constructor(
    public readonly model: string,
    public readonly field: string,
  ) {
    super(ErrorCode.IMMUTABLE_FIELD, `"${field}" of ${model} is immutable and cannot be assigned`, { model, field });
    this.name = 'ImmutableFieldError';
  }
}

/** A model configuration object has unknown keys or badly typed values. */
export class ConfigError extends RowModelError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(ErrorCode.CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }
}
