/**
 * Random TTLV tree generator.
 *
 * Produces valid node trees covering every encodable kind, with nested
 * Structures, empty payloads and values at the edges of their ranges.
 */

import { TtlvNode } from '../../src/TtlvNode';
import {
  boolean,
  byteString,
  dateTime,
  enumeration,
  integer,
  interval,
  longInteger,
  structure,
  textString,
} from '../../src/value';
import type { Value } from '../../src/value';

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves state 0
    this.state = seed || 1;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns `length` random bytes. */
  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.int(0, 255);
    }
    return out;
  }
}

export interface GeneratorOptions {
  /** Maximum Structure nesting depth (default: 4). */
  maxDepth?: number;
  /** Maximum children per Structure (default: 6). */
  maxChildren?: number;
  /** Maximum TextString / ByteString length (default: 40). */
  maxStringLength?: number;
  /** Probability of a Structure when depth allows (default: 0.3). */
  structureProbability?: number;
  /** Draw tags from 0..tagRange-1 so siblings share tags (default: 16). */
  tagRange?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 4,
  maxChildren: 6,
  maxStringLength: 40,
  structureProbability: 0.3,
  tagRange: 16,
};

const EDGE_INT32 = [0, 1, -1, 0x7fffffff, -0x80000000];
const EDGE_UINT32 = [0, 1, 0xffffffff];
const EDGE_INT64 = [0n, -1n, 0x7fffffffffffffffn, -0x8000000000000000n];

const TEXT_CHARS = [
  'a', 'b', 'z', 'A', 'Z', '0', '9', ' ', '"', '\\', '\n', '\t', '\u0000',
  'é', 'ß', '€', '漢', '😀',
];

type ScalarGenerator = (rng: Rng, opts: Required<GeneratorOptions>) => Value;

const SCALARS: readonly ScalarGenerator[] = [
  rng => integer(rng.chance(0.3) ? rng.pick(EDGE_INT32) : rng.int(-100000, 100000)),
  rng => longInteger(rng.chance(0.3) ? rng.pick(EDGE_INT64) : BigInt(rng.int(-1e9, 1e9)) * 1000n),
  rng => enumeration(rng.chance(0.3) ? rng.pick(EDGE_UINT32) : rng.int(0, 1000)),
  rng => boolean(rng.chance(0.5)),
  (rng, opts) => {
    let text = '';
    const length = rng.int(0, opts.maxStringLength);
    for (let i = 0; i < length; i++) text += rng.pick(TEXT_CHARS);
    return textString(text);
  },
  (rng, opts) => byteString(rng.bytes(rng.int(0, opts.maxStringLength))),
  rng => dateTime(rng.chance(0.3) ? rng.pick(EDGE_INT64) : BigInt(rng.int(0, 2_000_000_000))),
  rng => interval(rng.chance(0.3) ? rng.pick(EDGE_UINT32) : rng.int(0, 86400)),
];

function generateNode(rng: Rng, opts: Required<GeneratorOptions>, depth: number): TtlvNode {
  const tag = rng.int(0, opts.tagRange - 1);
  if (depth < opts.maxDepth && rng.chance(opts.structureProbability)) {
    const count = rng.int(0, opts.maxChildren);
    const children: TtlvNode[] = [];
    for (let i = 0; i < count; i++) {
      children.push(generateNode(rng, opts, depth + 1));
    }
    return new TtlvNode(tag, structure(children));
  }
  return new TtlvNode(tag, rng.pick(SCALARS)(rng, opts));
}

/** Generate a random tree whose root is always a Structure. */
export function generateTtlvTree(rng: Rng, options: GeneratorOptions = {}): TtlvNode {
  const opts = { ...DEFAULTS, ...options };
  const count = rng.int(0, opts.maxChildren);
  const children: TtlvNode[] = [];
  for (let i = 0; i < count; i++) {
    children.push(generateNode(rng, opts, 1));
  }
  return new TtlvNode(rng.int(0, opts.tagRange - 1), structure(children));
}
