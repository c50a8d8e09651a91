// Error taxonomy shared by every decoder

export type DecodeErrorKind =
  | 'OutOfBounds'
  | 'UnrecognizedFormat'
  | 'CircularDirectory'
  | 'CorruptDocument'
  | 'TooShort'
  | 'MalformedHeader'
  | 'UnsupportedMethod';

export abstract class DecodeError extends Error {
  abstract readonly kind: DecodeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }

  // False when no format matched, true when a format matched but its contents are damaged
  get recognized(): boolean {
    return this.kind !== 'UnrecognizedFormat';
  }
}

export class OutOfBoundsError extends DecodeError {
  readonly kind = 'OutOfBounds';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutOfBoundsError';
  }
}

export class UnrecognizedFormatError extends DecodeError {
  readonly kind = 'UnrecognizedFormat';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnrecognizedFormatError';
  }
}

export class CircularDirectoryError extends DecodeError {
  readonly kind = 'CircularDirectory';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CircularDirectoryError';
  }
}

export class CorruptDocumentError extends DecodeError {
  readonly kind = 'CorruptDocument';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorruptDocumentError';
  }
}

export class TooShortError extends DecodeError {
  readonly kind = 'TooShort';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TooShortError';
  }
}

export class MalformedHeaderError extends DecodeError {
  readonly kind = 'MalformedHeader';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedHeaderError';
  }
}

export class UnsupportedMethodError extends DecodeError {
  readonly kind = 'UnsupportedMethod';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnsupportedMethodError';
  }
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

// Runs a decoder and captures decode failures as a value; anything else still throws
export function attempt<T>(decode: () => T): DecodeResult<T> {
  try {
    return { ok: true, value: decode() };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    throw error;
  }
}

// Re-labels a cursor overrun inside a document body as document corruption
export function asCorruptDocument<T>(what: string, decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    if (error instanceof OutOfBoundsError) {
      throw new CorruptDocumentError(`${what} is truncated: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
