import type { Duplex, Readable, Writable } from 'stream';
import { TransportError } from '../errors';
import { logger } from '../utils/logger';
import { BluetoothAdapter, RfcommTarget } from './BluetoothAdapter';
import { DuplexSocket } from './DuplexSocket';
import { destroyStream } from './StreamDuplexSocket';

function describeTarget(target: RfcommTarget): string {
  return 'uuid' in target ? target.uuid : `channel ${target.channel}`;
}

export class BluetoothDuplexSocket implements DuplexSocket {
  private stream: Duplex | null = null;
  private connecting: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly adapter: BluetoothAdapter,
    readonly address: string,
    readonly target: RfcommTarget
  ) {}

  get isConnected(): boolean {
    return this.stream !== null && !this.closed && !this.stream.destroyed;
  }

  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('Socket is already closed'));
    }
    if (this.stream) {
      return Promise.resolve();
    }
    if (!this.connecting) {
      this.connecting = this.open();
    }
    return this.connecting;
  }

  getInputStream(): Readable {
    return this.requireStream();
  }

  getOutputStream(): Writable {
    return this.requireStream();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.stream) {
      await destroyStream(this.stream);
    }
  }

  private async open(): Promise<void> {
    let stream: Duplex;
    try {
      stream = await this.adapter.connect(this.address, this.target);
    } catch (error) {
      this.connecting = null;
      throw new TransportError(
        `Bluetooth connect to ${this.address} (${describeTarget(this.target)}) failed`,
        { address: this.address },
        { cause: error }
      );
    }

    stream.on('error', (error) => {
      logger.debug(`Bluetooth socket ${this.address} error`, { error });
    });
    if (this.closed) {
      await destroyStream(stream);
      throw new TransportError('Socket closed while connecting', { address: this.address });
    }
    this.stream = stream;
  }

  private requireStream(): Duplex {
    if (!this.stream || this.closed) {
      throw new TransportError('Bluetooth socket is not connected');
    }
    return this.stream;
  }
}
