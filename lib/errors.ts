'use strict';

export type TransportErrorKind = 'unreachable' | 'tls' | 'timeout' | 'http-status' | 'malformed-response';

export class TransportError extends Error {

  readonly kind: TransportErrorKind;

  readonly status: number | null;

  constructor(kind: TransportErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.status = options.status ?? null;
  }

  static unreachable(message: string, cause?: unknown): TransportError {
    return new TransportError('unreachable', message, { cause });
  }

  static tls(message: string, cause?: unknown): TransportError {
    return new TransportError('tls', message, { cause });
  }

  static timeout(timeoutMs: number): TransportError {
    return new TransportError('timeout', `Router request timed out after ${timeoutMs}ms.`);
  }

  static httpStatus(status: number, message = `Router returned HTTP ${status}.`): TransportError {
    return new TransportError('http-status', message, { status });
  }

  static malformed(message: string, cause?: unknown): TransportError {
    return new TransportError('malformed-response', message, { cause });
  }

  /**
   * Whether another attempt could plausibly succeed. Certificate problems,
   * client errors and unparsable payloads come back the same way every time.
   */
  get retryable(): boolean {
    if (this.kind === 'unreachable' || this.kind === 'timeout') {
      return true;
    }

    return this.kind === 'http-status' && this.status !== null && this.status >= 500;
  }

}

export class ConfigError extends Error {

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }

}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
