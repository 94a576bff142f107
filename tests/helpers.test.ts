import {
  fromHex,
  paddedLength,
  parseTtlvLength,
  peekNodeLength,
  signedBytesToBigInt,
  toHex,
  writeVariable,
} from '../src/helpers';

describe('paddedLength', () => {
  it('rounds up to a multiple of 8', () => {
    expect(paddedLength(0)).toBe(0);
    expect(paddedLength(1)).toBe(8);
    expect(paddedLength(8)).toBe(8);
    expect(paddedLength(9)).toBe(16);
    expect(paddedLength(12)).toBe(16);
  });
});

describe('writeVariable', () => {
  it('copies data and zero-fills the padding', () => {
    const buffer = new Uint8Array(16).fill(0xff);
    writeVariable(buffer, new Uint8Array([1, 2, 3]), 0);
    expect(toHex(buffer)).toBe('0102030000000000ffffffffffffffff');
  });

  it('writes at an offset', () => {
    const buffer = new Uint8Array(16).fill(0xff);
    writeVariable(buffer, new Uint8Array([0xaa]), 8);
    expect(toHex(buffer)).toBe('ffffffffffffffffaa00000000000000');
  });

  it('writes nothing for empty data', () => {
    const buffer = new Uint8Array(8).fill(0xff);
    writeVariable(buffer, new Uint8Array(0), 0);
    expect(toHex(buffer)).toBe('ffffffffffffffff');
  });

  it('throws when the padded data does not fit', () => {
    expect(() => writeVariable(new Uint8Array(4), new Uint8Array(3), 0)).toThrow(/^InsufficientBufferSize:/);
    expect(() => writeVariable(new Uint8Array(16), new Uint8Array(9), 8)).toThrow(/^InsufficientBufferSize:/);
  });
});

describe('parseTtlvLength', () => {
  it('returns the padded length field', () => {
    expect(parseTtlvLength(new Uint8Array([0, 0, 0, 0x0c]))).toBe(16);
    expect(parseTtlvLength(new Uint8Array([0, 0, 0, 0x10]))).toBe(16);
    expect(parseTtlvLength(new Uint8Array([0, 0, 0, 0]))).toBe(0);
  });

  it('reads at an offset', () => {
    expect(parseTtlvLength(new Uint8Array([0x42, 0, 0, 0x07, 0, 0, 0, 0x05]), 4)).toBe(8);
  });

  it('throws with fewer than 4 bytes', () => {
    expect(() => parseTtlvLength(new Uint8Array(3))).toThrow(/^InsufficientBufferSize:/);
    expect(() => parseTtlvLength(new Uint8Array(6), 3)).toThrow(/^InsufficientBufferSize:/);
  });
});

describe('peekNodeLength', () => {
  it('returns header plus padded payload', () => {
    expect(peekNodeLength(fromHex('4200030700000009'))).toBe(24);
    expect(peekNodeLength(fromHex('4200010100000000'))).toBe(8);
  });

  it('throws MissingStartByte for a bad first byte', () => {
    expect(() => peekNodeLength(fromHex('4100030700000009'))).toThrow(/^MissingStartByte:/);
  });

  it('throws InsufficientBufferSize for a short header', () => {
    expect(() => peekNodeLength(fromHex('42000307000000'))).toThrow(/^InsufficientBufferSize:/);
  });
});

describe('toHex / fromHex', () => {
  it('formats lowercase hex', () => {
    expect(toHex(new Uint8Array([0x00, 0x0f, 0xab, 0xff]))).toBe('000fabff');
    expect(toHex(new Uint8Array(0))).toBe('');
  });

  it('parses hex and ignores whitespace', () => {
    expect(Array.from(fromHex('42 00\n01\tAB'))).toEqual([0x42, 0x00, 0x01, 0xab]);
  });

  it('rejects odd length', () => {
    expect(() => fromHex('abc')).toThrow(/^InvalidValue:/);
  });

  it('rejects non-hex characters', () => {
    expect(() => fromHex('zz')).toThrow(/^InvalidValue:/);
  });
});

describe('signedBytesToBigInt', () => {
  it('reads two\'s complement values', () => {
    expect(signedBytesToBigInt(new Uint8Array(0))).toBe(0n);
    expect(signedBytesToBigInt(new Uint8Array([0xff]))).toBe(-1n);
    expect(signedBytesToBigInt(new Uint8Array([0x00, 0xff]))).toBe(255n);
    expect(signedBytesToBigInt(new Uint8Array([0x01, 0x00]))).toBe(256n);
    expect(signedBytesToBigInt(new Uint8Array([0xff, 0xff, 0xff, 0x00]))).toBe(-256n);
  });

  it('ignores sign extension bytes', () => {
    const short = signedBytesToBigInt(new Uint8Array([0x80]));
    const extended = signedBytesToBigInt(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x80]));
    expect(short).toBe(-128n);
    expect(extended).toBe(-128n);
  });
});
