/**
 * Payload codec for one scalar wire layout. Operates on the payload region
 * only; the node header is written and read by the encoder and decoder.
 * @template T The TypeScript type this codec encodes/decodes.
 */
export interface PayloadCodec<T> {
  /** Unpadded byte length the value declares in its header. */
  declaredLength(value: T): number;

  /**
   * Write the padded payload at the start of `payload`.
   * Returns the declared length. Throws if the payload does not fit.
   */
  encode(payload: Uint8Array, value: T): number;

  /**
   * Read a value from the payload region.
   * @param length  declared length from the node header
   */
  decode(payload: Uint8Array, length: number): T;
}
