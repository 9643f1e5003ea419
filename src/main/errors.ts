export type HandoverErrorCode = 'NDEF_FORMAT' | 'TRANSPORT' | 'EXCHANGE_PROTOCOL';

export class HandoverError extends Error {
  constructor(
    readonly code: HandoverErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed NDEF bytes, URIs, base64 envelopes or service UUIDs.
 */
export class NdefFormatError extends HandoverError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('NDEF_FORMAT', message, details, options);
  }
}

export class TransportError extends HandoverError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('TRANSPORT', message, details, options);
  }
}

export class ExchangeProtocolError extends HandoverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('EXCHANGE_PROTOCOL', message, details);
  }
}

export const getErrorCode = (error: unknown): string =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : '';
