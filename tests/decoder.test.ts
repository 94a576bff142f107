import { decode, decodeFromHex, decodeWithMetadata } from '../src/decoder';
import { TtlvError, isTtlvError } from '../src/errors';
import { MAX_NESTING_DEPTH, fromHex, signedBytesToBigInt, toHex } from '../src/helpers';
import { TtlvNode } from '../src/TtlvNode';
import { integer, structure, textString } from '../src/value';

const REQUEST_HEX =
  '4200000100000030' +
  '4200010100000010' +
  '4200020200000004' + '0000000600000000' +
  '420003070000000c' + '6d65737361676520' + '626f647900000000';

function request(): TtlvNode {
  return new TtlvNode(0, structure([
    new TtlvNode(1, structure([new TtlvNode(2, integer(6))])),
    new TtlvNode(3, textString('message body')),
  ]));
}

describe('decode', () => {
  it('decodes a nested request', () => {
    const result = decodeFromHex(REQUEST_HEX);
    expect(result.length).toBe(56);
    expect(result.truncations).toEqual([]);
    expect(result.node.equals(request())).toBe(true);
  });

  it('decodes each scalar kind', () => {
    expect(decodeFromHex('4200010300000008fffffffffffffffe').node.extract('LongInteger')).toBe(-2n);
    expect(decodeFromHex('4200010500000004ffffffff00000000').node.extract('Enumeration')).toBe(4294967295);
    expect(decodeFromHex('4200010600000008' + '0000000000000001').node.extract('Boolean')).toBe(true);
    expect(decodeFromHex('4200010900000008' + '000000006553f100').node.extract('DateTime')).toBe(1700000000n);
    expect(decodeFromHex('4200010a00000004' + '0000003c00000000').node.extract('Interval')).toBe(60);
  });

  it('decodes BigInteger as raw bytes', () => {
    const node = decodeFromHex('4200010400000008ffffffffffffff00').node;
    expect(signedBytesToBigInt(node.extract('BigInteger'))).toBe(-256n);
  });

  it('returns ByteString payloads as views into the buffer', () => {
    const bytes = fromHex('4200010800000003' + '0102030000000000');
    const value = decode(bytes).node.extract('ByteString');
    expect(Array.from(value)).toEqual([1, 2, 3]);
    bytes[8] = 0xaa;
    expect(value[0]).toBe(0xaa);
  });

  it('decodes at an offset', () => {
    const bytes = fromHex('ffffffffffffffff' + '4200050200000004' + '0000000600000000');
    const result = decode(bytes, 8);
    expect(result.length).toBe(16);
    expect(result.node.tag).toBe(5);
    expect(result.node.extract('Integer')).toBe(6);
  });

  it('ignores bytes after the node', () => {
    const result = decodeFromHex('4200050200000004' + '0000000600000000' + 'deadbeef');
    expect(result.length).toBe(16);
  });

  it('decodes an empty Structure', () => {
    const result = decodeFromHex('4200010100000000');
    expect(result.length).toBe(8);
    expect(result.node.children()).toHaveLength(0);
  });
});

describe('decode errors', () => {
  it('throws CorruptUtf8 for an invalid TextString', () => {
    expect(() => decodeFromHex('4200010700000001' + 'ff00000000000000')).toThrow(/^CorruptUtf8:/);
  });

  it('throws MissingStartByte', () => {
    expect(() => decodeFromHex('4100010200000004' + '0000000600000000')).toThrow(/^MissingStartByte:/);
  });

  it('throws UnsupportedType for unknown type codes', () => {
    expect(() => decodeFromHex('42000100000000000000000000000000')).toThrow(/^UnsupportedType:/);
    expect(() => decodeFromHex('4200010b00000004' + '0000000600000000')).toThrow(/^UnsupportedType:/);
  });

  it('throws InsufficientBufferSize for a short header', () => {
    expect(() => decode(new Uint8Array(7))).toThrow(/^InsufficientBufferSize:/);
    expect(() => decode(new Uint8Array(0))).toThrow(/^InsufficientBufferSize:/);
  });

  it('throws InsufficientBufferSize when the payload is cut off', () => {
    expect(() => decodeFromHex('4200010200000004')).toThrow(/^InsufficientBufferSize:/);
    expect(() => decodeFromHex('4200010700000010' + '6162636465666768')).toThrow(/^InsufficientBufferSize:/);
  });

  it('throws InsufficientBufferSize for a negative offset', () => {
    expect(() => decode(fromHex('4200010100000000'), -1)).toThrow(/^InsufficientBufferSize:/);
  });
});

describe('structure truncation', () => {
  // Structure declares 24 bytes: one Integer child, then 8 bytes without a start byte.
  const TRUNCATED = '4200010100000018' + '4200020200000004' + '0000000700000000' + '0000000000000000';

  it('keeps the children before the failing one', () => {
    const result = decodeFromHex(TRUNCATED);
    expect(result.length).toBe(32);
    expect(result.node.children()).toHaveLength(1);
    expect(result.node.path([2]).extract('Integer')).toBe(7);
  });

  it('reports the truncation', () => {
    const { truncations } = decodeFromHex(TRUNCATED);
    expect(truncations).toHaveLength(1);
    const [truncation] = truncations;
    expect(truncation.tag).toBe(1);
    expect(truncation.offset).toBe(0);
    expect(truncation.childOffset).toBe(24);
    expect(truncation.unreadBytes).toBe(8);
    expect(truncation.error).toBeInstanceOf(TtlvError);
    expect(truncation.error.kind).toBe('MissingStartByte');
  });

  it('reports a child that overruns its parent', () => {
    // Parent declares 16 bytes but its child claims 16 bytes of payload.
    const hex = '4200010100000010' + '4200020700000010' + '6162636465666768' + '6162636465666768';
    const result = decodeFromHex(hex);
    expect(result.length).toBe(24);
    expect(result.node.children()).toHaveLength(0);
    expect(result.truncations).toHaveLength(1);
    expect(result.truncations[0].error.kind).toBe('InsufficientBufferSize');
  });

  it('reports nested truncations', () => {
    const inner = '4200020100000008' + '0000000000000000';
    const hex = '4200010100000010' + inner;
    const result = decodeFromHex(hex);
    expect(result.truncations.map(t => t.tag)).toEqual([2]);
    expect(result.node.path([2]).children()).toHaveLength(0);
  });

  it('attaches the truncation to the node metadata', () => {
    const decoded = decodeWithMetadata(fromHex(TRUNCATED));
    expect(decoded.meta.truncation?.childOffset).toBe(24);
    expect(decoded.children[0].meta.truncation).toBeUndefined();
  });
});

describe('decodeWithMetadata', () => {
  const bytes = fromHex(REQUEST_HEX);
  const decoded = decodeWithMetadata(bytes);

  it('records the root encoding', () => {
    expect(decoded.meta.offset).toBe(0);
    expect(decoded.meta.length).toBe(56);
    expect(decoded.meta.declaredLength).toBe(48);
    expect(decoded.meta.typeCode).toBe(0x01);
    expect(decoded.meta.rawBytes.length).toBe(56);
  });

  it('records absolute offsets of nested nodes', () => {
    const [header, body] = decoded.children;
    expect(header.meta.offset).toBe(8);
    expect(header.children[0].meta.offset).toBe(16);
    expect(body.meta.offset).toBe(32);
    expect(body.meta.length).toBe(24);
    expect(body.meta.declaredLength).toBe(12);
    expect(body.meta.typeCode).toBe(0x07);
  });

  it('exposes each node\'s raw bytes', () => {
    const version = decoded.children[0].children[0];
    expect(toHex(version.meta.rawBytes)).toBe('4200020200000004' + '0000000600000000');
    expect(version.children).toEqual([]);
  });
});

describe('nesting depth', () => {
  /** `levels` Structures (tag 1), each wrapping the next, around Integer 6 (tag 2). */
  function nestedStructures(levels: number): Uint8Array {
    const bytes = new Uint8Array(levels * 8 + 16);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < levels; i++) {
      const at = i * 8;
      view.setUint8(at, 0x42);
      view.setUint16(at + 1, 1);
      view.setUint8(at + 3, 0x01);
      view.setUint32(at + 4, bytes.length - at - 8);
    }
    const leaf = levels * 8;
    view.setUint8(leaf, 0x42);
    view.setUint16(leaf + 1, 2);
    view.setUint8(leaf + 3, 0x02);
    view.setUint32(leaf + 4, 4);
    view.setUint32(leaf + 8, 6);
    return bytes;
  }

  it('decodes nesting up to the limit', () => {
    const result = decode(nestedStructures(MAX_NESTING_DEPTH));
    expect(result.length).toBe(MAX_NESTING_DEPTH * 8 + 16);
    expect(result.truncations).toEqual([]);
    const path = [...new Array<number>(MAX_NESTING_DEPTH - 1).fill(1), 2];
    expect(result.node.path(path).extract('Integer')).toBe(6);
  });

  it('throws NestingTooDeep one level past the limit', () => {
    expect(() => decode(nestedStructures(MAX_NESTING_DEPTH + 1))).toThrow(
      `NestingTooDeep: nesting depth exceeds ${MAX_NESTING_DEPTH}`,
    );
  });

  it('throws a TtlvError rather than overflowing the stack', () => {
    let caught: unknown;
    try {
      decode(nestedStructures(20000));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TtlvError);
    expect(isTtlvError(caught, 'NestingTooDeep')).toBe(true);
  });

  it('fails decodeWithMetadata the same way', () => {
    expect(() => decodeWithMetadata(nestedStructures(20000))).toThrow(/^NestingTooDeep:/);
  });
});
