import { PayloadCodec } from './Codec';
import { TtlvError } from '../errors';

/**
 * Big integers are sent as sign-extended two's complement bytes whose
 * length, including the extension bytes, is a multiple of 8. Choosing the
 * extension on encode is not implemented: encoding raises UnsupportedType.
 * Decoding returns the payload bytes as a view; `signedBytesToBigInt`
 * interprets them.
 */
export class BigIntegerCodec implements PayloadCodec<Uint8Array> {
  declaredLength(): number {
    throw new TtlvError('UnsupportedType', 'BigInteger encoding is not implemented');
  }

  encode(): number {
    throw new TtlvError('UnsupportedType', 'BigInteger encoding is not implemented');
  }

  decode(payload: Uint8Array, length: number): Uint8Array {
    return payload.subarray(0, length);
  }
}
