import { formatNotation } from '../../src/notation';
import { namedTags } from '../../src/tag';
import { TtlvNode } from '../../src/TtlvNode';
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
} from '../../src/value';

describe('formatNotation', () => {
  it('prints every kind with hex tags', () => {
    const node = new TtlvNode(0x10, structure([
      new TtlvNode(0x11, integer(-5)),
      new TtlvNode(0x12, longInteger(9007199254740993n)),
      new TtlvNode(0x13, enumeration(3)),
      new TtlvNode(0x14, boolean(false)),
      new TtlvNode(0x15, textString('say "hi"\n')),
      new TtlvNode(0x16, byteString(new Uint8Array([0xde, 0xad]))),
      new TtlvNode(0x17, dateTime(0n)),
      new TtlvNode(0x18, interval(5)),
      new TtlvNode(0x19, bigInteger(new Uint8Array([0xff]))),
      new TtlvNode(0x1a, structure([])),
    ]));

    expect(formatNotation(node)).toBe([
      '0x0010: Structure {',
      '  0x0011: Integer -5',
      '  0x0012: LongInteger 9007199254740993',
      '  0x0013: Enumeration 3',
      '  0x0014: Boolean false',
      '  0x0015: TextString "say \\"hi\\"\\n"',
      '  0x0016: ByteString <dead>',
      '  0x0017: DateTime 0',
      '  0x0018: Interval 5',
      '  0x0019: BigInteger <ff>',
      '  0x001a: Structure {}',
      '}',
    ].join('\n'));
  });

  it('prints known tags by name', () => {
    const names = namedTags({ Request: 0, ProtocolVersion: 2 });
    const node = new TtlvNode(0, structure([
      new TtlvNode(2, integer(6)),
      new TtlvNode(3, boolean(true)),
    ]));
    expect(formatNotation(node, names)).toBe([
      'Request: Structure {',
      '  ProtocolVersion: Integer 6',
      '  0x0003: Boolean true',
      '}',
    ].join('\n'));
  });

  it('falls back to hex for names that are not identifiers', () => {
    const names = namedTags({ 'Protocol Version': 2 });
    expect(formatNotation(new TtlvNode(2, integer(6)), names)).toBe('0x0002: Integer 6');
  });
});
