import * as net from 'net';
import type { Readable, Writable } from 'stream';
import { TransportError } from '../errors';
import { logger } from '../utils/logger';
import { DuplexSocket } from './DuplexSocket';
import { destroyStream } from './StreamDuplexSocket';

export class TcpDuplexSocket implements DuplexSocket {
  private socket: net.Socket | null;
  private connecting: Promise<void> | null = null;
  private closed = false;

  constructor(host: string, port: number);
  constructor(socket: net.Socket);
  constructor(
    private readonly target: string | net.Socket,
    private readonly port?: number
  ) {
    this.socket = typeof target === 'string' ? null : target;
    this.socket?.on('error', (error) => {
      logger.debug(`TCP socket ${this.remoteAddress} error`, { error });
    });
  }

  get isConnected(): boolean {
    return this.socket !== null && !this.closed && !this.socket.destroyed;
  }

  get remoteAddress(): string {
    if (typeof this.target === 'string') {
      return `${this.target}:${this.port ?? ''}`;
    }
    return `${this.target.remoteAddress ?? 'unknown'}:${this.target.remotePort ?? ''}`;
  }

  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('Socket is already closed'));
    }
    if (this.socket) {
      return Promise.resolve();
    }
    if (!this.connecting) {
      this.connecting = this.open();
    }
    return this.connecting;
  }

  getInputStream(): Readable {
    return this.requireSocket();
  }

  getOutputStream(): Writable {
    return this.requireSocket();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.socket) {
      await destroyStream(this.socket);
    }
  }

  private open(): Promise<void> {
    const host = typeof this.target === 'string' ? this.target : '';
    const port = this.port ?? 0;

    return new Promise<void>((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const onError = (error: Error) => {
        socket.destroy();
        this.connecting = null;
        reject(
          new TransportError(`TCP connect to ${host}:${port} failed`, { host, port }, {
            cause: error,
          })
        );
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.removeListener('error', onError);
        socket.setNoDelay(true);
        socket.on('error', (error) => {
          logger.debug(`TCP socket ${host}:${port} error`, { error });
        });
        if (this.closed) {
          socket.destroy();
          reject(new TransportError('Socket closed while connecting', { host, port }));
          return;
        }
        this.socket = socket;
        resolve();
      });
    });
  }

  private requireSocket(): net.Socket {
    if (!this.socket || this.closed) {
      throw new TransportError('TCP socket is not connected');
    }
    return this.socket;
  }
}
