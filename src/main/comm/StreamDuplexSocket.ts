import { Duplex, Readable, Writable } from 'stream';
import { TransportError } from '../errors';
import { logger } from '../utils/logger';
import { DuplexSocket } from './DuplexSocket';

export function destroyStream(stream: Readable | Writable): Promise<void> {
  if (stream.destroyed) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    stream.once('close', () => resolve());
    stream.destroy();
  });
}

/**
 * A duplex socket over already-open Node streams: an accepted connection, an RFCOMM
 * stream handed over by a Bluetooth binding, or an in-process pipe.
 */
export class StreamDuplexSocket implements DuplexSocket {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly shared: boolean;
  private closed = false;

  constructor(stream: Duplex);
  constructor(input: Readable, output: Writable);
  constructor(input: Readable, output?: Writable) {
    this.input = input;
    if (output) {
      this.output = output;
      this.shared = false;
    } else if (input instanceof Duplex) {
      this.output = input;
      this.shared = true;
    } else {
      throw new TransportError('A readable-only stream needs a separate output stream');
    }

    const onError = (error: Error) => {
      logger.debug('Stream socket error', { error });
    };
    this.input.on('error', onError);
    if (!this.shared) {
      this.output.on('error', onError);
    }
  }

  get isConnected(): boolean {
    return !this.closed;
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportError('Socket is already closed');
    }
  }

  getInputStream(): Readable {
    return this.input;
  }

  getOutputStream(): Writable {
    return this.output;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.shared) {
      await destroyStream(this.input);
      return;
    }
    await Promise.all([destroyStream(this.input), destroyStream(this.output)]);
  }
}
