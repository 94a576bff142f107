import { PayloadCodec } from './Codec';
import { TtlvError } from '../errors';
import { writeVariable } from '../helpers';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * UTF-8 text, zero-padded to a multiple of 8. The declared length counts
 * bytes, not characters.
 */
export class TextStringCodec implements PayloadCodec<string> {
  declaredLength(value: string): number {
    return encoder.encode(value).length;
  }

  encode(payload: Uint8Array, value: string): number {
    const bytes = encoder.encode(value);
    writeVariable(payload, bytes, 0);
    return bytes.length;
  }

  decode(payload: Uint8Array, length: number): string {
    try {
      return decoder.decode(payload.subarray(0, length));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TtlvError('CorruptUtf8', `invalid UTF-8 in ${length}-byte TextString (${reason})`);
    }
  }
}
