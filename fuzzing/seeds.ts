/**
 * Seed corpus of valid notation documents for mutation-based fuzzing.
 * Each seed exercises a different kind or nesting shape.
 */

/** A request with a header and a text body. */
export const SEED_REQUEST = `
0x0000: Structure {
  0x0001: Structure {
    0x0002: Integer 6
  }
  0x0003: TextString "message body"
}
`;

/** One node of every encodable scalar kind. */
export const SEED_SCALARS = `
0x0010: Structure {
  0x0011: Integer -2147483648
  0x0012: LongInteger 9223372036854775807
  0x0013: Enumeration 4294967295
  0x0014: Boolean true
  0x0015: TextString "tab\\there \\u00e9"
  0x0016: ByteString <00 01 fe ff>
  0x0017: DateTime 1700000000
  0x0018: Interval 86400
}
`;

/** Empty payloads. */
export const SEED_EMPTY = `
0x0020: Structure {
  0x0021: Structure {}
  0x0022: TextString ""
  0x0023: ByteString <>
}
`;

/** Deep nesting with repeated sibling tags. */
export const SEED_NESTED = `
# repeated tags resolve to the first match
0x0030: Structure {
  0x0031: Structure {
    0x0031: Structure {
      0x0032: Boolean false
      0x0032: Boolean true
    }
  }
  0x0031: Integer 1
}
`;

/** A bare scalar root. */
export const SEED_SCALAR_ROOT = `65535: LongInteger -1`;

export const ALL_SEEDS: readonly string[] = [
  SEED_REQUEST,
  SEED_SCALARS,
  SEED_EMPTY,
  SEED_NESTED,
  SEED_SCALAR_ROOT,
];
