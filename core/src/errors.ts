export enum ConversionErrorKind {
  INPUT_NOT_FOUND = 'input_not_found',
  UNSUPPORTED_FORMAT = 'unsupported_format',
  IMAGE_DECODE_FAILURE = 'image_decode_failure',
  WRITE_FAILURE = 'write_failure'
}

/**
 * Terminal failure of a single conversion.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.kind = kind;
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
