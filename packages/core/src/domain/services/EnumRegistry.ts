import type { EnumSource } from '../model/EnumSource.js';
import { EnumType } from '../model/EnumType.js';
import { SchemaDefinitionError } from '../errors.js';

/**
 * Identity map from declared enumerations to synthesized enum types.
 *
 * Scoped to a single synthesis run: each model synthesis creates its own
 * registry, so no enum type is shared between two synthesized models.
 */
export class EnumRegistry {
  private readonly bySource = new Map<EnumSource, EnumType>();
  private readonly sourcesByName = new Map<string, EnumSource>();

  /** Return the enum type for `source`, building it on first use. */
  resolve(source: EnumSource): EnumType {
    const existing = this.bySource.get(source);
    if (existing) return existing;

    const sameName = this.sourcesByName.get(source.name);
    if (sameName) {
      throw new SchemaDefinitionError(
        `Two different enumerations are named '${source.name}'; schema definitions would collide`,
        { enum: source.name },
      );
    }

    const enumType = new EnumType(source);
    this.bySource.set(source, enumType);
    this.sourcesByName.set(source.name, source);
    return enumType;
  }

  /** Enum types built so far, in order of first use. */
  get types(): readonly EnumType[] {
    return [...this.bySource.values()];
  }
}
