import { SchemaDefinitionError } from '../errors.js';

/** Value an enumeration member may carry. */
export type EnumValue = string | number;

/** One `(name, value)` pair of an enumeration, in declaration order. */
export interface EnumMember<V extends EnumValue = EnumValue> {
  readonly name: string;
  readonly value: V;
}

/**
 * An enumeration declared by the record-model author.
 *
 * The object's identity is the enumeration's identity: every column that
 * references the same `EnumSource` shares one definition in the synthesized
 * schema.
 */
export class EnumSource<V extends EnumValue = EnumValue> {
  readonly members: readonly EnumMember<V>[];

  constructor(
    readonly name: string,
    members: readonly EnumMember<V>[],
    readonly description?: string,
  ) {
    if (members.length === 0) {
      throw new SchemaDefinitionError(`Enumeration '${name}' declares no members`, { enum: name });
    }
    const seen = new Set<string>();
    for (const member of members) {
      if (seen.has(member.name)) {
        throw new SchemaDefinitionError(`Enumeration '${name}' declares member '${member.name}' twice`, {
          enum: name,
          member: member.name,
        });
      }
      seen.add(member.name);
    }
    this.members = Object.freeze(members.map((m) => Object.freeze({ name: m.name, value: m.value })));
    Object.freeze(this);
  }

  get values(): readonly V[] {
    return this.members.map((m) => m.value);
  }
}

function isReverseMapping(members: Readonly<Record<string, EnumValue>>, key: string, value: EnumValue): boolean {
  return typeof value === 'string' && members[value] === Number(key);
}

/**
 * Declare an enumeration from a name → value object, such as a TypeScript `enum`.
 *
 * Numeric `enum`s carry reverse mappings (`{ 0: 'A', A: 0 }`); those entries are skipped.
 * Other keys are kept even when they look numeric.
 *
 * @example
 * enum Bool { FALSE = 'F', TRUE = 'T' }
 * const BoolEnum = defineEnum('Bool', Bool);
 */
export function defineEnum<V extends EnumValue>(
  name: string,
  members: Readonly<Record<string, V>>,
  description?: string,
): EnumSource<V> {
  const entries = Object.entries(members).filter(([key, value]) => !isReverseMapping(members, key, value));
  return new EnumSource(
    name,
    entries.map(([memberName, value]) => ({ name: memberName, value })),
    description,
  );
}
