import { BooleanCodec } from '../../src/codecs/BooleanCodec';
import { fromHex, toHex } from '../../src/helpers';

describe('BooleanCodec', () => {
  const codec = new BooleanCodec();

  it('encodes as a 64-bit integer', () => {
    const payload = new Uint8Array(8).fill(0xff);
    expect(codec.encode(payload, true)).toBe(8);
    expect(toHex(payload)).toBe('0000000000000001');
    codec.encode(payload, false);
    expect(toHex(payload)).toBe('0000000000000000');
  });

  it('decodes any non-zero value as true', () => {
    expect(codec.decode(fromHex('0000000000000001'))).toBe(true);
    expect(codec.decode(fromHex('0200000000000000'))).toBe(true);
    expect(codec.decode(fromHex('0000000000000000'))).toBe(false);
  });

  it('throws when the payload is too small', () => {
    expect(() => codec.decode(new Uint8Array(4))).toThrow(/^InsufficientBufferSize:/);
  });
});
