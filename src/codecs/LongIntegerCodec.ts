import { PayloadCodec } from './Codec';
import { assertSpace, dataView } from '../helpers';

/**
 * 64-bit big-endian two's complement integer.
 * Used for LongInteger and DateTime (POSIX seconds).
 */
export class LongIntegerCodec implements PayloadCodec<bigint> {
  declaredLength(): number {
    return 8;
  }

  encode(payload: Uint8Array, value: bigint): number {
    assertSpace(payload, 8, '64-bit value');
    dataView(payload).setBigInt64(0, value);
    return 8;
  }

  decode(payload: Uint8Array): bigint {
    assertSpace(payload, 8, '64-bit value');
    return dataView(payload).getBigInt64(0);
  }
}
