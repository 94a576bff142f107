import { TtlvError } from './errors';

const TAG_MAX = 0xffff;

/**
 * Conversion between a domain tag type and its 16-bit wire number.
 * @template T The caller's tag identifier type.
 */
export interface TagCodec<T> {
  /** Never fails for a valid tag. */
  toWire(tag: T): number;

  /** Throws UnrecognizedTag if `wire` is not a known tag. */
  fromWire(wire: number): T;
}

/** Name lookup used by the text notation and CLIs. */
export interface TagNames {
  nameOf(wire: number): string | undefined;
  wireOf(name: string): number | undefined;
}

/** Members of a TypeScript numeric enum. */
export type EnumTag<E> = E[keyof E] & number;

export function assertWireTag(wire: number): void {
  if (!Number.isInteger(wire) || wire < 0 || wire > TAG_MAX) {
    throw new TtlvError('InvalidValue', `tag ${wire} out of range [0, ${TAG_MAX}]`);
  }
}

/** Identity codec over raw wire numbers. */
export const rawTags: TagCodec<number> = {
  toWire(tag: number): number {
    assertWireTag(tag);
    return tag;
  },
  fromWire(wire: number): number {
    assertWireTag(wire);
    return wire;
  },
};

/** Name table over a plain record, e.g. one loaded from JSON. */
export function namedTags(record: Readonly<Record<string, number>>): TagNames {
  const byWire = new Map<number, string>();
  const byName = new Map<string, number>();
  for (const [name, wire] of Object.entries(record)) {
    assertWireTag(wire);
    byName.set(name, wire);
    if (!byWire.has(wire)) {
      byWire.set(wire, name);
    }
  }
  return {
    nameOf: wire => byWire.get(wire),
    wireOf: name => byName.get(name),
  };
}

/**
 * Tag codec over a TypeScript numeric enum.
 *
 * ```ts
 * enum Tag { Request = 1, RequestHeader = 2 }
 * const tags = enumTags(Tag);
 * tags.fromWire(2); // Tag.RequestHeader
 * ```
 */
export function enumTags<E extends Record<string, string | number>>(
  enumObject: E,
): TagCodec<EnumTag<E>> & TagNames {
  const entries: Array<[string, string | number]> = Object.entries(enumObject);
  const record: Record<string, number> = {};
  for (const [name, wire] of entries) {
    if (typeof wire === 'number') {
      record[name] = wire;
    }
  }
  const names = namedTags(record);

  const members: ReadonlyArray<string | number> = Object.values(enumObject);
  const known = members.filter((m): m is EnumTag<E> => typeof m === 'number');

  return {
    toWire: tag => tag,
    fromWire(wire: number): EnumTag<E> {
      const found = known.find(m => m === wire);
      if (found === undefined) {
        throw new TtlvError('UnrecognizedTag', `no tag for wire value ${wire}`);
      }
      return found;
    },
    nameOf: names.nameOf,
    wireOf: names.wireOf,
  };
}
