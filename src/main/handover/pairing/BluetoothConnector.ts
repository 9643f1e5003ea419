import type { Duplex } from 'stream';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { PeerRole } from '../../../shared/types/handover';
import type { BluetoothAdapter, BluetoothServerSocket } from '../../comm/BluetoothAdapter';
import { BluetoothDuplexSocket } from '../../comm/BluetoothDuplexSocket';
import type { DuplexSocket } from '../../comm/DuplexSocket';
import { StreamDuplexSocket, destroyStream } from '../../comm/StreamDuplexSocket';
import { NdefFormatError, TransportError } from '../../errors';
import { NdefMessage } from '../../ndef/NdefMessage';
import { NdefRecord, RTD_COLLISION_RESOLUTION, Tnf } from '../../ndef/NdefRecord';
import { getQueryParameter } from '../../ndef/uri';
import { logger } from '../../utils/logger';
import { ConnectionHandoverManager } from '../ConnectionHandoverManager';
import { createHandoverRequest } from '../HandoverDetector';
import { UriSchemeHandover } from '../initiators/UriSchemeHandover';
import { generateNonce, resolveCollision } from './collision';

export const BT_SOCKET_SCHEME = 'btsocket';
export const DEFAULT_SERVICE_NAME = 'NfcBtHandover';

/**
 * Callbacks for a symmetric Bluetooth pairing.
 */
export interface OnConnectedListener {
  /** Fires once per negotiation, before the data channel is handed over. */
  beforeConnect(role: PeerRole): void;
  onConnectionEstablished(socket: DuplexSocket, role: PeerRole): void;
  /** Both sides published the same nonce; republish with a fresh one. */
  onCollisionDraw?(): void;
}

export interface BluetoothConnectorOptions {
  adapter: BluetoothAdapter;
  listener: OnConnectedListener;
  alwaysClient?: boolean;
  serviceUuid?: string;
  serviceName?: string;
  nonce?: Uint8Array;
}

/**
 * Lets two devices running the same code agree on who listens and who dials after
 * exchanging handover requests. Each side publishes a random nonce next to its own
 * listening socket; the nonces decide the roles.
 */
export class BluetoothConnector extends UriSchemeHandover {
  readonly serviceUuid: string;
  private readonly adapter: BluetoothAdapter;
  private readonly listener: OnConnectedListener;
  private readonly alwaysClient: boolean;
  private readonly serviceName: string;
  private collisionNonce: Buffer;
  private serverSocket: BluetoothServerSocket | null = null;
  private role: PeerRole | null = null;
  private established = false;

  constructor(options: BluetoothConnectorOptions) {
    super(BT_SOCKET_SCHEME);
    this.adapter = options.adapter;
    this.listener = options.listener;
    this.alwaysClient = options.alwaysClient ?? false;
    this.serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
    this.serviceUuid = options.serviceUuid ?? uuidv4();
    this.collisionNonce = options.nonce ? Buffer.from(options.nonce) : generateNonce();

    if (!isUuid(this.serviceUuid)) {
      throw new NdefFormatError(`Invalid service uuid: ${this.serviceUuid}`);
    }
  }

  /**
   * Connects as client to the peer described by `message`, without publishing a request.
   */
  static join(
    adapter: BluetoothAdapter,
    listener: OnConnectedListener,
    message: NdefMessage
  ): Promise<'consumed' | 'propagated'> {
    const connector = new BluetoothConnector({ adapter, listener, alwaysClient: true });
    const manager = new ConnectionHandoverManager();
    manager.addConnectionHandover(connector);
    return manager.attemptHandover(message);
  }

  get nonce(): Buffer {
    return Buffer.from(this.collisionNonce);
  }

  get negotiatedRole(): PeerRole | null {
    return this.role;
  }

  get isListening(): boolean {
    return this.serverSocket !== null;
  }

  /**
   * Opens the listening socket and returns the handover request to publish, with any
   * application records appended after the candidate.
   */
  async prepare(appRecords: readonly NdefRecord[] = []): Promise<NdefMessage> {
    if (!this.alwaysClient && !this.serverSocket) {
      const server = await this.adapter.listen(this.serviceName, this.serviceUuid);
      this.serverSocket = server;
      void this.acceptOne(server);
    }
    return this.getHandoverRequestMessage(appRecords);
  }

  getHandoverRequestMessage(appRecords: readonly NdefRecord[] = []): NdefMessage {
    let target = `${BT_SOCKET_SCHEME}://${this.adapter.address}/${this.serviceUuid}`;
    const channel = this.serverSocket?.channel ?? null;
    if (channel !== null) {
      target += `?channel=${channel}`;
    }

    const request = createHandoverRequest([target], this.collisionNonce);
    return new NdefMessage([...request.records, ...appRecords]);
  }

  /**
   * Picks a fresh nonce after a draw. Republish `getHandoverRequestMessage()` afterwards.
   */
  renewNonce(): Buffer {
    this.collisionNonce = generateNonce();
    return this.nonce;
  }

  async doConnectionHandover(message: NdefMessage, candidateIndex: number): Promise<void> {
    let role: PeerRole;
    if (this.alwaysClient) {
      role = 'client';
    } else {
      const remote = this.findCollisionNonce(message);
      const outcome = resolveCollision(this.collisionNonce, remote);
      if (outcome === 'draw') {
        logger.warn('Bluetooth handover collision draw; both sides must republish');
        this.listener.onCollisionDraw?.();
        return;
      }
      role = outcome;
    }

    role = this.beginNegotiation(role);
    if (role === 'server') {
      logger.info('Waiting for Bluetooth peer as server');
      return;
    }

    await this.closeServerSocket();
    const uri = this.candidateUri(message, candidateIndex);
    const address = uri.authority;
    const uuid = uri.path.slice(1);
    if (!address || !isUuid(uuid)) {
      throw new NdefFormatError('Bad btsocket uri', { candidateIndex, address, uuid });
    }
    const channelParam = getQueryParameter(uri, 'channel');
    const channel = channelParam === null ? null : Number.parseInt(channelParam, 10);

    const socket = await this.connectClient(address, uuid, Number.isNaN(channel) ? null : channel);
    this.deliver(socket, 'client');
  }

  async close(): Promise<void> {
    await this.closeServerSocket();
  }

  private findCollisionNonce(message: NdefMessage): Buffer {
    const record = message.records.find((candidate) =>
      candidate.hasType(Tnf.WELL_KNOWN, RTD_COLLISION_RESOLUTION)
    );
    if (!record) {
      throw new NdefFormatError('Handover request has no collision resolution record');
    }
    return record.payload;
  }

  private beginNegotiation(role: PeerRole): PeerRole {
    if (this.role === null) {
      this.role = role;
      this.listener.beforeConnect(role);
    }
    return this.role;
  }

  private async connectClient(
    address: string,
    uuid: string,
    channel: number | null
  ): Promise<DuplexSocket> {
    if (channel !== null) {
      const direct = new BluetoothDuplexSocket(this.adapter, address, { channel });
      try {
        await direct.connect();
        return direct;
      } catch (error) {
        logger.debug(`Could not connect to channel ${channel}; using service lookup`, { error });
      }
    }

    const socket = new BluetoothDuplexSocket(this.adapter, address, { uuid });
    await socket.connect();
    return socket;
  }

  private async acceptOne(server: BluetoothServerSocket): Promise<void> {
    let stream: Duplex;
    try {
      stream = await server.accept();
    } catch (error) {
      if (this.serverSocket === server) {
        logger.warn('Bluetooth accept failed', { error });
        await this.closeServerSocket();
      }
      return;
    }

    if (this.beginNegotiation('server') !== 'server') {
      await destroyStream(stream);
      return;
    }
    await this.closeServerSocket();
    this.deliver(new StreamDuplexSocket(stream), 'server');
  }

  private deliver(socket: DuplexSocket, role: PeerRole): void {
    if (this.established) {
      void socket.close();
      return;
    }
    this.established = true;
    logger.info(`Bluetooth connection established as ${role}`);
    this.listener.onConnectionEstablished(socket, role);
  }

  private async closeServerSocket(): Promise<void> {
    const server = this.serverSocket;
    if (!server) {
      return;
    }
    this.serverSocket = null;
    try {
      await server.close();
    } catch (error) {
      throw new TransportError('Failed to close Bluetooth server socket', undefined, {
        cause: error,
      });
    }
  }
}
