export type ErrorCode =
  | 'TRUNCATED'
  | 'OUT_OF_RANGE'
  | 'MALFORMED_HEADER'
  | 'MALFORMED_RECORD'
  | 'UNSUPPORTED_VERSION'
  | 'READ_FAILED'
  | 'INVALID_PARAMS'
  | 'INTERNAL_ERROR';

export class DatError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DatError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

export function truncated(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('TRUNCATED', message, data);
}

export function outOfRange(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('OUT_OF_RANGE', message, data);
}

export function malformedHeader(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('MALFORMED_HEADER', message, data);
}

export function malformedRecord(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('MALFORMED_RECORD', message, data);
}

export function unsupportedVersion(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('UNSUPPORTED_VERSION', message, data);
}

export function readFailed(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('READ_FAILED', message, data);
}

export function invalidParams(message: string, data?: Record<string, unknown>): DatError {
  return new DatError('INVALID_PARAMS', message, data);
}

/** Wraps anything thrown into a DatError, keeping DatErrors as they are. */
export function toDatError(err: unknown): DatError {
  if (err instanceof DatError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new DatError('INTERNAL_ERROR', message);
}
