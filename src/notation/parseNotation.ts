import * as peggy from 'peggy';
import { TtlvError } from '../errors';
import { fromHex } from '../helpers';
import { assertWireTag } from '../tag';
import type { TagNames } from '../tag';
import { TtlvNode } from '../TtlvNode';
import {
  bigInteger,
  boolean,
  byteString,
  dateTime,
  enumeration,
  integer,
  interval,
  longInteger,
  structure,
  textString,
} from '../value';
import type { Value, ValueType } from '../value';
import { TTLV_GRAMMAR } from './grammar';

type TagRef =
  | { kind: 'number'; value: number }
  | { kind: 'name'; value: string };

type Literal =
  | { kind: 'integer'; text: string }
  | { kind: 'string'; value: string }
  | { kind: 'bytes'; hex: string }
  | { kind: 'boolean'; value: boolean };

type NodeBody =
  | { type: 'Structure'; children: TtlvNode[] }
  | { type: Exclude<ValueType, 'Structure'>; literal: Literal };

interface SourceLocation {
  start: { line: number; column: number };
}

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(TTLV_GRAMMAR);
  }
  return cachedParser;
}

function parseInteger(text: string): bigint {
  const negative = text.startsWith('-');
  const magnitude = BigInt(negative ? text.slice(1) : text);
  return negative ? -magnitude : magnitude;
}

function mismatch(type: ValueType, expected: string, literal: Literal): TtlvError {
  return new TtlvError('InvalidValue', `${type} literal must be ${expected}, got ${literal.kind}`);
}

function integerLiteral(type: ValueType, literal: Literal): bigint {
  if (literal.kind !== 'integer') throw mismatch(type, 'integer', literal);
  return parseInteger(literal.text);
}

function bytesLiteral(type: ValueType, literal: Literal): Uint8Array {
  if (literal.kind !== 'bytes') throw mismatch(type, 'bytes', literal);
  return fromHex(literal.hex);
}

function scalarValue(type: Exclude<ValueType, 'Structure'>, literal: Literal): Value {
  switch (type) {
    case 'Integer':
    case 'Enumeration':
    case 'Interval': {
      const n = integerLiteral(type, literal);
      if (n < BigInt(Number.MIN_SAFE_INTEGER) || n > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new TtlvError('InvalidValue', `${type} ${n} out of range`);
      }
      const make = type === 'Integer' ? integer : type === 'Enumeration' ? enumeration : interval;
      return make(Number(n));
    }
    case 'LongInteger':
      return longInteger(integerLiteral(type, literal));
    case 'DateTime':
      return dateTime(integerLiteral(type, literal));
    case 'Boolean':
      if (literal.kind !== 'boolean') throw mismatch(type, 'boolean', literal);
      return boolean(literal.value);
    case 'TextString':
      if (literal.kind !== 'string') throw mismatch(type, 'string', literal);
      return textString(literal.value);
    case 'ByteString':
      return byteString(bytesLiteral(type, literal));
    case 'BigInteger':
      return bigInteger(bytesLiteral(type, literal));
  }
}

function resolveTag(ref: TagRef, names: TagNames | undefined): number {
  if (ref.kind === 'number') {
    assertWireTag(ref.value);
    return ref.value;
  }
  const wire = names?.wireOf(ref.value);
  if (wire === undefined) {
    throw new TtlvError('UnrecognizedTag', `unknown tag name "${ref.value}"`);
  }
  return wire;
}

/**
 * Parse the text notation produced by `formatNotation` into a node tree.
 *
 * @param names - resolves tag names; without it only numeric tags are accepted
 * @throws peggy's SyntaxError for malformed text, TtlvError for unknown
 *   tag names and literals that do not fit their type
 */
export function parseNotation(text: string, names?: TagNames): TtlvNode {
  const build = (tag: TagRef, body: NodeBody, location: SourceLocation): TtlvNode => {
    try {
      const value = body.type === 'Structure' ? structure(body.children) : scalarValue(body.type, body.literal);
      return new TtlvNode(resolveTag(tag, names), value);
    } catch (err) {
      if (!(err instanceof TtlvError)) throw err;
      throw new TtlvError(err.kind, `${err.detail} (line ${location.start.line}, column ${location.start.column})`);
    }
  };

  const result: unknown = getParser().parse(text, { build });
  if (!(result instanceof TtlvNode)) {
    throw new TtlvError('InvalidValue', 'notation did not produce a node');
  }
  return result;
}
