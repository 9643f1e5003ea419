import { EventEmitter } from 'events';
import * as net from 'net';
import { TransportError } from '../errors';
import { ExchangeOutcome, NdefExchange, NdefExchangeContract } from '../exchange/NdefExchange';
import { DEFAULT_TCP_HANDOVER_PORT } from '../handover/initiators/TcpPushHandover';
import { logger } from '../utils/logger';
import { TcpDuplexSocket } from './TcpDuplexSocket';

export interface TcpHandoverListenerOptions {
  port?: number;
  host?: string;
}

/**
 * Accepting side of a TCP handover: every inbound connection runs one exchange
 * against `contract`. Emits `exchange` with the outcome of each.
 */
export class TcpHandoverListener extends EventEmitter {
  private server: net.Server | null = null;
  private readonly sockets = new Set<TcpDuplexSocket>();
  private readonly exchanges = new Set<Promise<ExchangeOutcome>>();

  constructor(
    private readonly contract: NdefExchangeContract,
    private readonly options: TcpHandoverListenerOptions = {}
  ) {
    super();
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  async start(): Promise<number> {
    if (this.server) {
      throw new TransportError('TCP handover listener already started');
    }

    const server = net.createServer((socket) => this.accept(socket));
    server.on('error', (error) => {
      logger.error('TCP handover listener error', { error });
    });

    const port = this.options.port ?? DEFAULT_TCP_HANDOVER_PORT;
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(
          new TransportError(`Cannot listen on port ${port}`, { port }, { cause: error })
        );
      };
      server.once('error', onError);
      server.listen(port, this.options.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });

    this.server = server;
    logger.info(`TCP handover listening on port ${this.port ?? port}`);
    return this.port ?? port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await Promise.all([...this.sockets].map((socket) => socket.close()));
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    await Promise.all(this.exchanges);
  }

  private accept(connection: net.Socket): void {
    const socket = new TcpDuplexSocket(connection);
    logger.info(`Accepted handover connection from ${socket.remoteAddress}`);
    this.sockets.add(socket);

    const task = new NdefExchange(socket, this.contract).run();
    this.exchanges.add(task);
    void task.then((outcome) => {
      this.sockets.delete(socket);
      this.exchanges.delete(task);
      this.emit('exchange', outcome);
    });
  }
}
