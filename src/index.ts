export { TtlvError, isTtlvError } from './errors';
export type { TtlvErrorKind } from './errors';
export {
  START_BYTE,
  HEADER_LENGTH,
  MIN_ENCODE_SPACE,
  MAX_NESTING_DEPTH,
  paddedLength,
  writeVariable,
  parseTtlvLength,
  peekNodeLength,
  toHex,
  fromHex,
  signedBytesToBigInt,
} from './helpers';
export { rawTags, namedTags, enumTags } from './tag';
export type { TagCodec, TagNames, EnumTag } from './tag';
export {
  TYPE_CODES,
  VALUE_TYPES,
  typeFromCode,
  structure,
  integer,
  longInteger,
  bigInteger,
  enumeration,
  boolean,
  textString,
  byteString,
  dateTime,
  interval,
  dateTimeToDate,
} from './value';
export type { Value, ValueMap, ValueType } from './value';
export { TtlvNode } from './TtlvNode';
export { encode, encodedLength, encodeToBytes, encodeToHex } from './encoder';
export { decode, decodeWithMetadata, decodeFromHex } from './decoder';
export type { DecodeResult, DecodedTtlv, NodeMeta, StructureTruncation } from './decoder';
export type { PayloadCodec } from './codecs/Codec';
export { parseNotation, formatNotation } from './notation';
