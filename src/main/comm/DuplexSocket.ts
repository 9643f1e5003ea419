import type { Readable, Writable } from 'stream';

/**
 * Transport-agnostic bidirectional byte stream. `close()` is idempotent and may be
 * called from either direction of an exchange.
 */
export interface DuplexSocket {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  getInputStream(): Readable;
  getOutputStream(): Writable;
  close(): Promise<void>;
}
