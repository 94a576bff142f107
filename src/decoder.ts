import { TtlvError } from './errors';
import { HEADER_LENGTH, START_BYTE, assertDepth, dataView, fromHex, paddedLength } from './helpers';
import { TtlvNode } from './TtlvNode';
import { typeFromCode } from './value';
import type { Value, ValueType } from './value';
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

/**
 * A Structure whose children scan stopped on a child that failed to decode
 * while bytes were still left in the Structure. The children before the
 * failure are kept; the rest are not visible in the decoded tree.
 */
export interface StructureTruncation {
  /** Tag of the truncated Structure. */
  tag: number;
  /** Absolute offset of the Structure's header. */
  offset: number;
  /** Absolute offset of the child that failed. */
  childOffset: number;
  /** Bytes of the Structure's payload that were not decoded. */
  unreadBytes: number;
  /** Why the child failed. */
  error: TtlvError;
}

/** Encoding details of a decoded node. */
export interface NodeMeta {
  /** Absolute offset of the node header in the source buffer. */
  offset: number;
  /** Total encoded size: header plus padded payload. */
  length: number;
  /** Length field from the header. */
  declaredLength: number;
  typeCode: number;
  /** The node's encoding, as a view into the source buffer. */
  rawBytes: Uint8Array;
  truncation?: StructureTruncation;
}

/** A decoded node with the metadata of its encoding, children included. */
export interface DecodedTtlv {
  node: TtlvNode;
  meta: NodeMeta;
  /** Decoded children of a Structure; empty for other kinds. */
  children: DecodedTtlv[];
}

export interface DecodeResult {
  node: TtlvNode;
  /** Bytes consumed: 8 plus the padded declared length. */
  length: number;
  /** Every Structure in the tree whose children scan stopped early. */
  truncations: readonly StructureTruncation[];
}

function decodeScalar(type: Exclude<ValueType, 'Structure'>, payload: Uint8Array, length: number): Value {
  switch (type) {
    case 'Integer':
      return { type, value: INTEGER.decode(payload) };
    case 'Enumeration':
    case 'Interval':
      return { type, value: UNSIGNED.decode(payload) };
    case 'LongInteger':
    case 'DateTime':
      return { type, value: LONG_INTEGER.decode(payload) };
    case 'BigInteger':
      return { type, value: BIG_INTEGER.decode(payload, length) };
    case 'Boolean':
      return { type, value: BOOLEAN.decode(payload) };
    case 'TextString':
      return { type, value: TEXT_STRING.decode(payload, length) };
    case 'ByteString':
      return { type, value: BYTE_STRING.decode(payload, length) };
  }
}

/**
 * Decode the node at `start`, reading no further than `end`.
 * Truncated Structures are appended to `truncations`.
 */
function decodeAt(
  bytes: Uint8Array,
  start: number,
  end: number,
  truncations: StructureTruncation[],
  depth: number,
): DecodedTtlv {
  assertDepth(depth);
  if (start < 0 || end - start < HEADER_LENGTH) {
    throw new TtlvError(
      'InsufficientBufferSize',
      `node header needs ${HEADER_LENGTH} bytes, ${Math.max(end - start, 0)} available at offset ${start}`,
    );
  }
  const view = dataView(bytes.subarray(start, start + HEADER_LENGTH));
  if (view.getUint8(0) !== START_BYTE) {
    throw new TtlvError('MissingStartByte', `expected 0x42 at offset ${start}, found 0x${view.getUint8(0).toString(16)}`);
  }
  const tag = view.getUint16(1);
  const typeCode = view.getUint8(3);
  const type = typeFromCode(typeCode);
  if (type === undefined) {
    throw new TtlvError('UnsupportedType', `unknown type code 0x${typeCode.toString(16)} at offset ${start}`);
  }
  const declaredLength = view.getUint32(4);
  const length = HEADER_LENGTH + paddedLength(declaredLength);
  if (length > end - start) {
    throw new TtlvError(
      'InsufficientBufferSize',
      `node at offset ${start} needs ${length} bytes, ${end - start} available`,
    );
  }

  const payloadStart = start + HEADER_LENGTH;
  const meta: NodeMeta = {
    offset: start,
    length,
    declaredLength,
    typeCode,
    rawBytes: bytes.subarray(start, start + length),
  };

  if (type !== 'Structure') {
    const value = decodeScalar(type, bytes.subarray(payloadStart, end), declaredLength);
    return { node: new TtlvNode(tag, value), meta, children: [] };
  }

  const regionEnd = payloadStart + declaredLength;
  const children: DecodedTtlv[] = [];
  let cursor = payloadStart;
  while (cursor < regionEnd) {
    let child: DecodedTtlv;
    try {
      child = decodeAt(bytes, cursor, regionEnd, truncations, depth + 1);
    } catch (err) {
      if (!(err instanceof TtlvError) || err.kind === 'NestingTooDeep') throw err;
      meta.truncation = {
        tag,
        offset: start,
        childOffset: cursor,
        unreadBytes: regionEnd - cursor,
        error: err,
      };
      truncations.push(meta.truncation);
      break;
    }
    children.push(child);
    cursor += child.meta.length;
  }

  const node = new TtlvNode(tag, { type: 'Structure', value: children.map(c => c.node) });
  return { node, meta, children };
}

/**
 * Decode the node at `offset`, returning it with its metadata tree.
 * Byte payloads in the result are views into `buffer`.
 */
export function decodeWithMetadata(buffer: Uint8Array, offset = 0): DecodedTtlv {
  return decodeAt(buffer, offset, buffer.length, [], 0);
}

/**
 * Decode the node at `offset`.
 *
 * A Structure's children are read until its payload is used up or a child
 * fails to decode. A failing child does not fail the call: the scan stops
 * there and the Structure is listed in `truncations`. Nesting deeper than
 * MAX_NESTING_DEPTH fails the call with NestingTooDeep.
 */
export function decode(buffer: Uint8Array, offset = 0): DecodeResult {
  const truncations: StructureTruncation[] = [];
  const decoded = decodeAt(buffer, offset, buffer.length, truncations, 0);
  return { node: decoded.node, length: decoded.meta.length, truncations };
}

/** Decode a hex string. */
export function decodeFromHex(hex: string): DecodeResult {
  return decode(fromHex(hex));
}
