/**
 * Mutation strategies for byte- and text-based fuzzing.
 *
 * Byte mutators take a valid encoding and damage it to exercise the
 * decoder's error paths. Text mutators do the same for the notation parser.
 */

import { Rng } from './ttlv-generator';

/** A mutation function over an encoded buffer. Never modifies its input. */
export type ByteMutator = (input: Uint8Array, rng: Rng) => Uint8Array;

/** A mutation function over notation text. */
export type TextMutator = (input: string, rng: Rng) => string;

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Replace a random byte. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] = rng.int(0, 255);
  return out;
}

/** Cut the buffer at a random point. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  return input.slice(0, rng.int(0, input.length));
}

/** Insert random bytes at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  const extra = rng.bytes(rng.int(1, 16));
  const out = new Uint8Array(input.length + extra.length);
  out.set(input.subarray(0, pos), 0);
  out.set(extra, pos);
  out.set(input.subarray(pos), pos + extra.length);
  return out;
}

/** Overwrite the length field of the header at a random 8-byte boundary. */
export function lengthCorrupt(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length < 8) return input;
  const out = input.slice();
  const header = rng.int(0, Math.floor(out.length / 8) - 1) * 8;
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint32(header + 4, rng.chance(0.5) ? rng.int(0, 64) : rng.int(0, 0xffffffff) >>> 0);
  return out;
}

/** Overwrite the type code of the header at a random 8-byte boundary. */
export function typeCodeCorrupt(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length < 8) return input;
  const out = input.slice();
  out[rng.int(0, Math.floor(out.length / 8) - 1) * 8 + 3] = rng.int(0, 12);
  return out;
}

export const BYTE_MUTATORS: readonly ByteMutator[] = [
  bitFlip,
  byteReplace,
  truncate,
  byteInsert,
  lengthCorrupt,
  typeCodeCorrupt,
];

// -- Text-level mutations --

/** Replace a random character with a printable ASCII one. */
export function charReplace(input: string, rng: Rng): string {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  return input.slice(0, pos) + String.fromCharCode(rng.int(32, 126)) + input.slice(pos + 1);
}

/** Delete a random character. */
export function charDelete(input: string, rng: Rng): string {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  return input.slice(0, pos) + input.slice(pos + 1);
}

const KEYWORDS = [
  'Structure', 'Integer', 'LongInteger', 'BigInteger', 'Enumeration', 'Boolean',
  'TextString', 'ByteString', 'DateTime', 'Interval', 'true', 'false',
];

/** Replace a type keyword with another. */
export function keywordSwap(input: string, rng: Rng): string {
  const present = KEYWORDS.filter(k => input.includes(k));
  if (present.length === 0) return input;
  const target = rng.pick(present);
  const idx = input.indexOf(target);
  return input.slice(0, idx) + rng.pick(KEYWORDS) + input.slice(idx + target.length);
}

/** Replace a digit run with an extreme number. */
export function numberSwap(input: string, rng: Rng): string {
  const match = /-?\d+/.exec(input);
  if (!match) return input;
  const replacement = rng.pick(['0', '-1', '4294967296', '-2147483649', '99999999999999999999', '65536']);
  return input.slice(0, match.index) + replacement + input.slice(match.index + match[0].length);
}

/** Drop a closing or opening brace. */
export function braceDrop(input: string, rng: Rng): string {
  const brace = rng.pick(['{', '}']);
  const idx = input.lastIndexOf(brace);
  if (idx < 0) return input;
  return input.slice(0, idx) + input.slice(idx + 1);
}

export const TEXT_MUTATORS: readonly TextMutator[] = [
  charReplace,
  charDelete,
  keywordSwap,
  numberSwap,
  braceDrop,
];

/** Apply 1 to `maxMutations` random mutations. */
export function mutateBytes(input: Uint8Array, rng: Rng, maxMutations = 3): Uint8Array {
  let result = input;
  const count = rng.int(1, maxMutations);
  for (let i = 0; i < count; i++) {
    result = rng.pick(BYTE_MUTATORS)(result, rng);
  }
  return result;
}

/** Apply 1 to `maxMutations` random text mutations. */
export function mutateText(input: string, rng: Rng, maxMutations = 3): string {
  let result = input;
  const count = rng.int(1, maxMutations);
  for (let i = 0; i < count; i++) {
    result = rng.pick(TEXT_MUTATORS)(result, rng);
  }
  return result;
}
