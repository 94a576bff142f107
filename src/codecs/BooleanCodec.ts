import { PayloadCodec } from './Codec';
import { assertSpace, dataView } from '../helpers';

/**
 * Boolean as a 64-bit big-endian integer: 1 = true, 0 = false.
 * Any non-zero value decodes as true.
 */
export class BooleanCodec implements PayloadCodec<boolean> {
  declaredLength(): number {
    return 8;
  }

  encode(payload: Uint8Array, value: boolean): number {
    assertSpace(payload, 8, 'Boolean');
    dataView(payload).setBigUint64(0, value ? 1n : 0n);
    return 8;
  }

  decode(payload: Uint8Array): boolean {
    assertSpace(payload, 8, 'Boolean');
    return dataView(payload).getBigUint64(0) !== 0n;
  }
}
