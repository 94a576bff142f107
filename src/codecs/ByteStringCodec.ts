import { PayloadCodec } from './Codec';
import { writeVariable } from '../helpers';

/**
 * Raw bytes, zero-padded to a multiple of 8.
 * Decoding returns a view into the source buffer, not a copy.
 */
export class ByteStringCodec implements PayloadCodec<Uint8Array> {
  declaredLength(value: Uint8Array): number {
    return value.length;
  }

  encode(payload: Uint8Array, value: Uint8Array): number {
    writeVariable(payload, value, 0);
    return value.length;
  }

  decode(payload: Uint8Array, length: number): Uint8Array {
    return payload.subarray(0, length);
  }
}
