import { TtlvError } from './errors';
import type { TtlvNode } from './TtlvNode';

/** Payload carried by each value kind. */
export interface ValueMap {
  Structure: readonly TtlvNode[];
  Integer: number;
  LongInteger: bigint;
  /** Sign-extended two's complement bytes. Decode only. */
  BigInteger: Uint8Array;
  Enumeration: number;
  Boolean: boolean;
  TextString: string;
  ByteString: Uint8Array;
  /** POSIX time in seconds. */
  DateTime: bigint;
  /** Duration in seconds. */
  Interval: number;
}

export type ValueType = keyof ValueMap;

/**
 * A tagged payload. The `type` discriminant selects both the TypeScript
 * payload type and the wire type code.
 */
export type Value = { [K in ValueType]: { readonly type: K; readonly value: ValueMap[K] } }[ValueType];

/** Wire type code for each kind. */
export const TYPE_CODES: { readonly [K in ValueType]: number } = {
  Structure: 0x01,
  Integer: 0x02,
  LongInteger: 0x03,
  BigInteger: 0x04,
  Enumeration: 0x05,
  Boolean: 0x06,
  TextString: 0x07,
  ByteString: 0x08,
  DateTime: 0x09,
  Interval: 0x0a,
};

export const VALUE_TYPES: readonly ValueType[] = [
  'Structure',
  'Integer',
  'LongInteger',
  'BigInteger',
  'Enumeration',
  'Boolean',
  'TextString',
  'ByteString',
  'DateTime',
  'Interval',
];

const TYPES_BY_CODE = new Map<number, ValueType>(VALUE_TYPES.map(t => [TYPE_CODES[t], t]));

/** Look up the kind for a wire type code. */
export function typeFromCode(code: number): ValueType | undefined {
  return TYPES_BY_CODE.get(code);
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const UINT32_MAX = 0xffffffff;
const LONE_SURROGATE = /[\uD800-\uDFFF]/u;

function assertInRange(type: ValueType, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new TtlvError('InvalidValue', `${type} ${value} out of range [${min}, ${max}]`);
  }
}

function assertInt64(type: ValueType, value: bigint): void {
  if (BigInt.asIntN(64, value) !== value) {
    throw new TtlvError('InvalidValue', `${type} ${value} does not fit in 64 bits`);
  }
}

/**
 * Check that a payload is representable on the wire.
 * Structure children are already-validated nodes.
 */
export function validateValue(value: Value): void {
  switch (value.type) {
    case 'Integer':
      assertInRange(value.type, value.value, INT32_MIN, INT32_MAX);
      return;
    case 'Enumeration':
    case 'Interval':
      assertInRange(value.type, value.value, 0, UINT32_MAX);
      return;
    case 'LongInteger':
    case 'DateTime':
      assertInt64(value.type, value.value);
      return;
    case 'TextString':
      if (LONE_SURROGATE.test(value.value)) {
        throw new TtlvError('InvalidValue', 'TextString contains a lone surrogate');
      }
      return;
    case 'Structure':
    case 'BigInteger':
    case 'Boolean':
    case 'ByteString':
      return;
  }
}

function checked(value: Value): Value {
  validateValue(value);
  return value;
}

function toBigInt(type: ValueType, value: bigint | number): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new TtlvError('InvalidValue', `${type} ${value} is not a safe integer`);
  }
  return BigInt(value);
}

export function structure(children: readonly TtlvNode[]): Value {
  return { type: 'Structure', value: children };
}

export function integer(value: number): Value {
  return checked({ type: 'Integer', value });
}

export function longInteger(value: bigint | number): Value {
  return checked({ type: 'LongInteger', value: toBigInt('LongInteger', value) });
}

/** Only decodable; encoding a BigInteger raises UnsupportedType. */
export function bigInteger(bytes: Uint8Array): Value {
  return { type: 'BigInteger', value: bytes };
}

export function enumeration(value: number): Value {
  return checked({ type: 'Enumeration', value });
}

export function boolean(value: boolean): Value {
  return { type: 'Boolean', value };
}

export function textString(value: string): Value {
  return checked({ type: 'TextString', value });
}

export function byteString(bytes: Uint8Array): Value {
  return { type: 'ByteString', value: bytes };
}

/** A Date is truncated to whole seconds. */
export function dateTime(value: Date | bigint | number): Value {
  const seconds = value instanceof Date ? Math.floor(value.getTime() / 1000) : value;
  return checked({ type: 'DateTime', value: toBigInt('DateTime', seconds) });
}

export function interval(seconds: number): Value {
  return checked({ type: 'Interval', value: seconds });
}

const MAX_DATE_SECONDS = 8_640_000_000_000n;

/** Convert DateTime seconds to a Date. Throws InvalidValue beyond the Date range of ±8.64e12 s. */
export function dateTimeToDate(seconds: bigint): Date {
  if (seconds > MAX_DATE_SECONDS || seconds < -MAX_DATE_SECONDS) {
    throw new TtlvError('InvalidValue', `DateTime ${seconds} is outside the Date range`);
  }
  return new Date(Number(seconds) * 1000);
}
