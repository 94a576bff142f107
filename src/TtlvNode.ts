import { TtlvError } from './errors';
import { assertWireTag } from './tag';
import type { TagCodec } from './tag';
import { validateValue } from './value';
import type { Value, ValueMap, ValueType } from './value';

type Extractors = { readonly [K in ValueType]: (value: Value) => ValueMap[K] | undefined };

const EXTRACTORS: Extractors = {
  Structure: v => (v.type === 'Structure' ? v.value : undefined),
  Integer: v => (v.type === 'Integer' ? v.value : undefined),
  LongInteger: v => (v.type === 'LongInteger' ? v.value : undefined),
  BigInteger: v => (v.type === 'BigInteger' ? v.value : undefined),
  Enumeration: v => (v.type === 'Enumeration' ? v.value : undefined),
  Boolean: v => (v.type === 'Boolean' ? v.value : undefined),
  TextString: v => (v.type === 'TextString' ? v.value : undefined),
  ByteString: v => (v.type === 'ByteString' ? v.value : undefined),
  DateTime: v => (v.type === 'DateTime' ? v.value : undefined),
  Interval: v => (v.type === 'Interval' ? v.value : undefined),
};

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function sameValue(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'Structure': {
      if (b.type !== 'Structure' || a.value.length !== b.value.length) return false;
      const other = b.value;
      return a.value.every((child, i) => child.equals(other[i]));
    }
    case 'BigInteger':
    case 'ByteString':
      return b.type === a.type && sameBytes(a.value, b.value);
    default:
      return b.type === a.type && b.value === a.value;
  }
}

/**
 * A tagged value in a TTLV tree. Immutable: a Structure's child list is
 * copied and frozen on construction.
 *
 * Byte payloads (ByteString, BigInteger) are held by reference. After
 * decode they are views into the decoded buffer and change with it.
 */
export class TtlvNode {
  readonly tag: number;
  readonly value: Value;

  constructor(tag: number, value: Value) {
    assertWireTag(tag);
    validateValue(value);
    this.tag = tag;
    this.value = value.type === 'Structure'
      ? { type: 'Structure', value: Object.freeze([...value.value]) }
      : value;
  }

  /** Build a node from a typed tag. */
  static of<T>(codec: TagCodec<T>, tag: T, value: Value): TtlvNode {
    return new TtlvNode(codec.toWire(tag), value);
  }

  get type(): ValueType {
    return this.value.type;
  }

  /** The tag viewed through a tag codec. Throws UnrecognizedTag for unknown numbers. */
  tagAs<T>(codec: TagCodec<T>): T {
    return codec.fromWire(this.tag);
  }

  /**
   * The payload, if this node is exactly of kind `type`.
   * No widening: an Integer node never yields a LongInteger.
   */
  extract<K extends ValueType>(type: K): ValueMap[K] {
    const payload = EXTRACTORS[type](this.value);
    if (payload === undefined) {
      throw new TtlvError('TypeMismatch', `requested ${type}, node is ${this.value.type}`);
    }
    return payload;
  }

  /** Child nodes in wire order. */
  children(): readonly TtlvNode[] {
    if (this.value.type !== 'Structure') {
      throw new TtlvError('TypeMismatch', `tag 0x${hexTag(this.tag)} is ${this.value.type}, not Structure`);
    }
    return this.value.value;
  }

  /**
   * Walk down nested Structures, taking the first child whose tag matches
   * each segment. An empty path returns this node.
   */
  path(tags: readonly number[]): TtlvNode;
  path<T>(tags: readonly T[], codec: TagCodec<T>): TtlvNode;
  path(tags: readonly unknown[], codec?: TagCodec<unknown>): TtlvNode {
    const wire = tags.map(tag => toWireTag(tag, codec));
    let current: TtlvNode = this;
    for (const segment of wire) {
      const next = current.children().find(child => child.tag === segment);
      if (!next) {
        throw new TtlvError('ChildNotFound', `no child with tag 0x${hexTag(segment)} under 0x${hexTag(current.tag)}`);
      }
      current = next;
    }
    return current;
  }

  /** Structural equality; byte payloads compare by content. */
  equals(other: TtlvNode): boolean {
    return this.tag === other.tag && sameValue(this.value, other.value);
  }
}

function toWireTag(tag: unknown, codec?: TagCodec<unknown>): number {
  if (codec) return codec.toWire(tag);
  if (typeof tag === 'number') {
    assertWireTag(tag);
    return tag;
  }
  throw new TtlvError('UnrecognizedTag', `path segment ${String(tag)} is not a wire tag`);
}

function hexTag(tag: number): string {
  return tag.toString(16).padStart(4, '0');
}
