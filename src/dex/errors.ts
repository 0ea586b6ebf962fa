export type FetchErrorKind = 'network' | 'contract-reverted' | 'decode';

const REVERT_CODES = new Set(['CALL_EXCEPTION']);
const DECODE_CODES = new Set([
  'BUFFER_OVERRUN',
  'NUMERIC_FAULT',
  'INVALID_ARGUMENT',
  'BAD_DATA',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * A quote could not be obtained from one exchange. Recoverable: the cycle
 * that hit it is skipped and the next tick tries again.
 */
export class FetchError extends Error {
  constructor(
    public readonly kind: FetchErrorKind,
    public readonly exchange: string,
    message: string,
    public cause?: unknown,
  ) {
    super(`[${exchange}] ${kind}: ${message}`);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static network(exchange: string, message: string, cause?: unknown) {
    return new FetchError('network', exchange, message, cause);
  }

  static reverted(exchange: string, message: string, cause?: unknown) {
    return new FetchError('contract-reverted', exchange, message, cause);
  }

  static decode(exchange: string, message: string, cause?: unknown) {
    return new FetchError('decode', exchange, message, cause);
  }

  /** Map an ethers v5 error (or anything else a transport threw). */
  static fromUnknown(error: unknown, exchange: string): FetchError {
    if (error instanceof FetchError) return error;
    const code = errorCode(error);
    const message = errorMessage(error);
    if (code && REVERT_CODES.has(code)) {
      return FetchError.reverted(exchange, message, error);
    }
    if (code && DECODE_CODES.has(code)) {
      return FetchError.decode(exchange, message, error);
    }
    return FetchError.network(exchange, message, error);
  }
}

/** Raised when the running cycle was cancelled by shutdown. */
export class CycleAbortedError extends Error {
  constructor() {
    super('Cycle aborted');
    this.name = 'CycleAbortedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
