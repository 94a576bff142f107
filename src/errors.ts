/**
 * Failure kinds raised by the codec. Every kind is terminal for the call
 * that raised it.
 */
export type TtlvErrorKind =
  | 'UnsupportedType'
  | 'TypeMismatch'
  | 'ChildNotFound'
  | 'MissingStartByte'
  | 'InsufficientBufferSize'
  | 'CorruptUtf8'
  | 'UnrecognizedTag'
  | 'NestingTooDeep'
  | 'InvalidValue';

/** The single error type thrown for all TTLV failures. */
export class TtlvError extends Error {
  readonly kind: TtlvErrorKind;
  /** The message without the kind prefix. */
  readonly detail: string;

  constructor(kind: TtlvErrorKind, detail: string) {
    super(`${kind}: ${detail}`);
    this.name = 'TtlvError';
    this.kind = kind;
    this.detail = detail;
  }
}

/** Type guard: checks if a value is a TtlvError, optionally of a given kind. */
export function isTtlvError(value: unknown, kind?: TtlvErrorKind): value is TtlvError {
  return value instanceof TtlvError && (kind === undefined || value.kind === kind);
}
