import { TtlvError } from './errors';
import {
  HEADER_LENGTH,
  MIN_ENCODE_SPACE,
  START_BYTE,
  assertDepth,
  dataView,
  paddedLength,
  toHex,
} from './helpers';
import type { TtlvNode } from './TtlvNode';
import { TYPE_CODES } from './value';
import type { Value } from './value';
import { BigIntegerCodec } from './codecs/BigIntegerCodec';
import { BooleanCodec } from './codecs/BooleanCodec';
import { ByteStringCodec } from './codecs/ByteStringCodec';
import { IntegerCodec } from './codecs/IntegerCodec';
import { LongIntegerCodec } from './codecs/LongIntegerCodec';
import { TextStringCodec } from './codecs/TextStringCodec';

const INTEGER = new IntegerCodec({ signed: true });
const UNSIGNED = new IntegerCodec({ signed: false });
const LONG_INTEGER = new LongIntegerCodec();
const BIG_INTEGER = new BigIntegerCodec();
const BOOLEAN = new BooleanCodec();
const TEXT_STRING = new TextStringCodec();
const BYTE_STRING = new ByteStringCodec();

/** Write the payload at the start of `payload`; returns the declared length. */
function encodePayload(value: Value, payload: Uint8Array, depth: number): number {
  switch (value.type) {
    case 'Structure': {
      let cursor = 0;
      for (const child of value.value) {
        cursor += encodeNode(child, payload.subarray(cursor), depth + 1);
      }
      return cursor;
    }
    case 'Integer':
      return INTEGER.encode(payload, value.value);
    case 'Enumeration':
    case 'Interval':
      return UNSIGNED.encode(payload, value.value);
    case 'LongInteger':
    case 'DateTime':
      return LONG_INTEGER.encode(payload, value.value);
    case 'BigInteger':
      return BIG_INTEGER.encode();
    case 'Boolean':
      return BOOLEAN.encode(payload, value.value);
    case 'TextString':
      return TEXT_STRING.encode(payload, value.value);
    case 'ByteString':
      return BYTE_STRING.encode(payload, value.value);
  }
}

function encodeNode(node: TtlvNode, buffer: Uint8Array, depth: number): number {
  assertDepth(depth);
  if (buffer.length < MIN_ENCODE_SPACE) {
    throw new TtlvError(
      'InsufficientBufferSize',
      `encoding needs at least ${MIN_ENCODE_SPACE} bytes, ${buffer.length} available`,
    );
  }
  const view = dataView(buffer);
  view.setUint8(0, START_BYTE);
  view.setUint16(1, node.tag);
  const declared = encodePayload(node.value, buffer.subarray(HEADER_LENGTH), depth);
  view.setUint8(3, TYPE_CODES[node.value.type]);
  view.setUint32(4, declared);
  return HEADER_LENGTH + paddedLength(declared);
}

/**
 * Encode `node` into `buffer` starting at `offset`.
 * Requires at least 16 bytes at the start of every node, including nested
 * ones. Returns the number of bytes written, always a multiple of 8.
 * Throws NestingTooDeep past MAX_NESTING_DEPTH.
 */
export function encode(node: TtlvNode, buffer: Uint8Array, offset = 0): number {
  if (offset < 0 || offset > buffer.length) {
    throw new TtlvError('InsufficientBufferSize', `offset ${offset} outside ${buffer.length}-byte buffer`);
  }
  return encodeNode(node, buffer.subarray(offset), 0);
}

function measure(node: TtlvNode, depth: number): number {
  assertDepth(depth);
  const value = node.value;
  switch (value.type) {
    case 'Structure':
      return value.value.reduce((sum, child) => sum + measure(child, depth + 1), HEADER_LENGTH);
    case 'Integer':
    case 'Enumeration':
    case 'Interval':
      return HEADER_LENGTH + paddedLength(INTEGER.declaredLength());
    case 'LongInteger':
    case 'DateTime':
      return HEADER_LENGTH + paddedLength(LONG_INTEGER.declaredLength());
    case 'BigInteger':
      return HEADER_LENGTH + paddedLength(BIG_INTEGER.declaredLength());
    case 'Boolean':
      return HEADER_LENGTH + paddedLength(BOOLEAN.declaredLength());
    case 'TextString':
      return HEADER_LENGTH + paddedLength(TEXT_STRING.declaredLength(value.value));
    case 'ByteString':
      return HEADER_LENGTH + paddedLength(BYTE_STRING.declaredLength(value.value));
  }
}

/** Total encoded size of `node`, computed without a buffer. */
export function encodedLength(node: TtlvNode): number {
  return measure(node, 0);
}

/** Encode into a freshly allocated array holding exactly the encoded bytes. */
export function encodeToBytes(node: TtlvNode): Uint8Array {
  const length = encodedLength(node);
  // An empty Structure last in its parent is 8 bytes but still needs 16 at its start.
  const buffer = new Uint8Array(length + MIN_ENCODE_SPACE - HEADER_LENGTH);
  const written = encode(node, buffer);
  return buffer.slice(0, written);
}

/** Encode and return lowercase hex. */
export function encodeToHex(node: TtlvNode): string {
  return toHex(encodeToBytes(node));
}
