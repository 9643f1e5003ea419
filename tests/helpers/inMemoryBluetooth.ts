import type { Duplex } from 'stream';
import type {
  BluetoothAdapter,
  BluetoothServerSocket,
  RfcommTarget,
} from '../../src/main/comm/BluetoothAdapter';
import { createSocketPair } from './socketPair';

interface Waiter {
  resolve: (stream: Duplex) => void;
  reject: (error: Error) => void;
}

export class InMemoryServerSocket implements BluetoothServerSocket {
  private readonly pending: Duplex[] = [];
  private readonly waiters: Waiter[] = [];
  closed = false;

  constructor(
    readonly channel: number | null,
    readonly uuid: string,
    private readonly onClose: () => void
  ) {}

  accept(): Promise<Duplex> {
    const next = this.pending.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new Error('Server socket closed'));
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  deliver(stream: Duplex): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(stream);
    } else {
      this.pending.push(stream);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.onClose();
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new Error('Server socket closed'));
    }
  }
}

/**
 * A shared radio for in-memory adapters: services registered by one adapter are
 * reachable from every other adapter by address and uuid or channel.
 */
export class InMemoryBluetoothNetwork {
  private readonly servers = new Map<string, InMemoryServerSocket>();
  private nextChannel = 1;

  createAdapter(
    address: string,
    options: { exposeChannel?: boolean } = {}
  ): InMemoryBluetoothAdapter {
    return new InMemoryBluetoothAdapter(this, address, options.exposeChannel ?? true);
  }

  register(address: string, uuid: string, exposeChannel: boolean): InMemoryServerSocket {
    const channel = this.nextChannel++;
    const server = new InMemoryServerSocket(exposeChannel ? channel : null, uuid, () => {
      this.servers.delete(`${address}/${uuid}`);
      this.servers.delete(`${address}#${channel}`);
    });
    this.servers.set(`${address}/${uuid}`, server);
    this.servers.set(`${address}#${channel}`, server);
    return server;
  }

  find(address: string, target: RfcommTarget): InMemoryServerSocket | undefined {
    const key = 'uuid' in target ? `${address}/${target.uuid}` : `${address}#${target.channel}`;
    return this.servers.get(key);
  }
}

export class InMemoryBluetoothAdapter implements BluetoothAdapter {
  readonly connects: Array<{ address: string; target: RfcommTarget }> = [];
  readonly servers: InMemoryServerSocket[] = [];
  readonly serviceNames: string[] = [];

  constructor(
    private readonly network: InMemoryBluetoothNetwork,
    readonly address: string,
    private readonly exposeChannel: boolean
  ) {}

  async connect(address: string, target: RfcommTarget): Promise<Duplex> {
    this.connects.push({ address, target });
    const server = this.network.find(address, target);
    if (!server) {
      throw new Error(`Connection refused by ${address}`);
    }
    const [client, remote] = createSocketPair();
    server.deliver(remote);
    return client;
  }

  async listen(serviceName: string, uuid: string): Promise<BluetoothServerSocket> {
    this.serviceNames.push(serviceName);
    const server = this.network.register(this.address, uuid, this.exposeChannel);
    this.servers.push(server);
    return server;
  }
}
