import { TtlvError } from './errors';

/** First byte of every encoded node. */
export const START_BYTE = 0x42;

/** Start byte, tag, type code and declared length. */
export const HEADER_LENGTH = 8;

/**
 * Space required at the start of every encode call. Covers the smallest
 * node that carries a payload (an 8-byte header plus one 8-byte slot).
 */
export const MIN_ENCODE_SPACE = 16;

/** Deepest Structure nesting accepted by encode and decode; the root is depth 0. */
export const MAX_NESTING_DEPTH = 512;

/** Throw NestingTooDeep past MAX_NESTING_DEPTH. */
export function assertDepth(depth: number): void {
  if (depth > MAX_NESTING_DEPTH) {
    throw new TtlvError('NestingTooDeep', `nesting depth exceeds ${MAX_NESTING_DEPTH}`);
  }
}

/** Round a byte count up to the next multiple of 8. */
export function paddedLength(length: number): number {
  return Math.ceil(length / 8) * 8;
}

/** Throw InsufficientBufferSize unless `bytes` holds at least `needed` bytes. */
export function assertSpace(bytes: Uint8Array, needed: number, what: string): void {
  if (bytes.length < needed) {
    throw new TtlvError(
      'InsufficientBufferSize',
      `${what} needs ${needed} bytes, ${bytes.length} available`,
    );
  }
}

/** Big-endian view over exactly the bytes of `bytes`. */
export function dataView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Copy `data` into `buffer` at `offset` and zero-fill the rest of its
 * padded length.
 */
export function writeVariable(buffer: Uint8Array, data: Uint8Array, offset: number): void {
  const padded = paddedLength(data.length);
  if (offset < 0 || buffer.length - offset < padded) {
    throw new TtlvError(
      'InsufficientBufferSize',
      `need ${padded} bytes at offset ${offset}, buffer has ${Math.max(buffer.length - offset, 0)}`,
    );
  }
  buffer.set(data, offset);
  buffer.fill(0, offset + data.length, offset + padded);
}

/**
 * Read a 4-byte big-endian length field and return its padded value.
 * Lets a caller predict how many payload bytes a node will occupy before
 * they have all arrived.
 */
export function parseTtlvLength(bytes: Uint8Array, offset = 0): number {
  if (offset < 0 || bytes.length - offset < 4) {
    throw new TtlvError('InsufficientBufferSize', 'length field needs 4 bytes');
  }
  return paddedLength(dataView(bytes).getUint32(offset));
}

/**
 * Total encoded size of the node whose 8-byte header starts at `offset`.
 */
export function peekNodeLength(bytes: Uint8Array, offset = 0): number {
  if (offset < 0 || bytes.length - offset < HEADER_LENGTH) {
    throw new TtlvError('InsufficientBufferSize', `node header needs ${HEADER_LENGTH} bytes`);
  }
  if (bytes[offset] !== START_BYTE) {
    throw new TtlvError('MissingStartByte', `expected 0x42 at offset ${offset}`);
  }
  return HEADER_LENGTH + parseTtlvLength(bytes, offset + 4);
}

/** Lowercase hex representation. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

/** Parse a hex string; whitespace is ignored. */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0) {
    throw new TtlvError('InvalidValue', `hex string has odd length ${clean.length}`);
  }
  if (!/^[0-9a-fA-F]*$/.test(clean)) {
    throw new TtlvError('InvalidValue', 'hex string contains non-hex characters');
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Interpret big-endian two's complement bytes as a signed integer.
 * Leading 0x00 / 0xff bytes are sign extension and do not change the value.
 */
export function signedBytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  let result = 0n;
  for (let i = 0; i < bytes.length; i++) {
    result = (result << 8n) | BigInt(bytes[i]);
  }
  return BigInt.asIntN(bytes.length * 8, result);
}
