import { z } from 'zod';
import { ConfigError } from '../errors.js';

/** How keyword input that matches no field is treated. */
export type ExtraPolicy = 'ignore' | 'forbid' | 'allow';

/** Model-level configuration handed to the model runtime. */
export interface ModelConfig {
  /** Re-validate a field when it is assigned on an instance. Default `false`. */
  readonly validateAssignment?: boolean;
  /** Default `'ignore'`. */
  readonly extra?: ExtraPolicy;
  /** Accept the field name as well as its alias in keyword input. Default `false`. */
  readonly populateByName?: boolean;
  /** Reject every assignment on instances. Default `false`. */
  readonly frozen?: boolean;
  /** Schema title. Defaults to the model name. */
  readonly title?: string;
}

export interface ResolvedModelConfig {
  readonly validateAssignment: boolean;
  readonly extra: ExtraPolicy;
  readonly populateByName: boolean;
  readonly frozen: boolean;
  readonly title?: string;
}

const modelConfigSchema = z
  .object({
    validateAssignment: z.boolean().default(false),
    extra: z.enum(['ignore', 'forbid', 'allow']).default('ignore'),
    populateByName: z.boolean().default(false),
    frozen: z.boolean().default(false),
    title: z.string().min(1).optional(),
  })
  .strict();

/** Apply defaults to a model configuration, rejecting unknown keys. */
export function parseModelConfig(config: ModelConfig | undefined): ResolvedModelConfig {
  const result = modelConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.code === z.ZodIssueCode.unrecognized_keys
        ? `unknown option(s) ${issue.keys.map((k) => `'${k}'`).join(', ')}`
        : `'${issue.path.join('.')}' ${issue.message}`,
    );
    throw new ConfigError(`Invalid model configuration: ${problems.join('; ')}`, { problems });
  }
  return Object.freeze(result.data);
}
