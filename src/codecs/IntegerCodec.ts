import { PayloadCodec } from './Codec';
import { assertSpace, dataView } from '../helpers';

export interface IntegerCodecOptions {
  /** Two's complement when true, unsigned otherwise. */
  signed: boolean;
}

/**
 * 32-bit big-endian integer followed by 4 reserved zero bytes.
 * Used for Integer (signed), Enumeration and Interval (unsigned).
 */
export class IntegerCodec implements PayloadCodec<number> {
  private readonly signed: boolean;

  constructor(options: IntegerCodecOptions) {
    this.signed = options.signed;
  }

  declaredLength(): number {
    return 4;
  }

  encode(payload: Uint8Array, value: number): number {
    assertSpace(payload, 8, '32-bit value');
    const view = dataView(payload);
    if (this.signed) {
      view.setInt32(0, value);
    } else {
      view.setUint32(0, value);
    }
    view.setUint32(4, 0);
    return 4;
  }

  decode(payload: Uint8Array): number {
    assertSpace(payload, 4, '32-bit value');
    const view = dataView(payload);
    return this.signed ? view.getInt32(0) : view.getUint32(0);
  }
}
