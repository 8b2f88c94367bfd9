import type { EnumMember, EnumSource, EnumValue } from './EnumSource.js';

const DEFAULT_DESCRIPTION = 'An enumeration.';

/** JSON-Schema definition emitted under `definitions` for an enumeration. */
export interface EnumDefinition {
  readonly title: string;
  readonly description: string;
  readonly enum: readonly EnumValue[];
  readonly type?: 'string' | 'integer' | 'number';
}

/**
 * The enumeration type a synthesized model validates against.
 *
 * Built once per {@link EnumSource} per synthesis run, with the same member
 * names and values in the same order.
 */
export class EnumType {
  readonly name: string;
  readonly description: string;
  readonly members: readonly EnumMember[];
  readonly values: readonly EnumValue[];
  private readonly valuesByName: ReadonlyMap<string, EnumValue>;

  constructor(source: EnumSource) {
    this.name = source.name;
    this.description = source.description ?? DEFAULT_DESCRIPTION;
    this.members = source.members;
    this.values = Object.freeze(source.members.map((m) => m.value));
    this.valuesByName = new Map(source.members.map((m) => [m.name, m.value]));
  }

  has(value: unknown): value is EnumValue {
    return (typeof value === 'string' || typeof value === 'number') && this.values.includes(value);
  }

  memberValue(name: string): EnumValue | undefined {
    return this.valuesByName.get(name);
  }

  memberName(value: EnumValue): string | undefined {
    return this.members.find((m) => m.value === value)?.name;
  }

  /** JSON type shared by every value, when there is one. */
  get jsonType(): EnumDefinition['type'] {
    if (this.values.every((v) => typeof v === 'string')) return 'string';
    if (this.values.every((v) => Number.isInteger(v))) return 'integer';
    if (this.values.every((v) => typeof v === 'number')) return 'number';
    return undefined;
  }

  toDefinition(): EnumDefinition {
    const type = this.jsonType;
    return {
      title: this.name,
      description: this.description,
      enum: [...this.values],
      ...(type !== undefined ? { type } : {}),
    };
  }
}
