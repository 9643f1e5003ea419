import type { HandlerResult, HandoverSettings } from '../../shared/types/handover';
import type { BluetoothAdapter } from '../comm/BluetoothAdapter';
import { TcpHandoverListener, TcpHandoverListenerOptions } from '../comm/TcpHandoverListener';
import { DEFAULT_SETTINGS } from '../config/settingsStore';
import type { NdefExchangeContract } from '../exchange/NdefExchange';
import type { NdefMessage } from '../ndef/NdefMessage';
import { logger } from '../utils/logger';
import { ConnectionHandoverManager } from './ConnectionHandoverManager';
import { EmptyMessageHandler } from './EmptyMessageHandler';
import { NdefDispatcher } from './NdefDispatcher';
import { DEFAULT_PRIORITY, NdefHandler, isPrioritizedHandler } from './NdefHandler';
import { PendingExchange } from './PendingExchange';
import { BluetoothPushHandover } from './initiators/BluetoothPushHandover';
import { TcpPushHandover } from './initiators/TcpPushHandover';
import {
  BluetoothConnector,
  BluetoothConnectorOptions,
  OnConnectedListener,
} from './pairing/BluetoothConnector';

/**
 * Entry point for applications: owns the handler chain, the connection handover
 * manager and the foreground message sent on every exchange.
 */
export class HandoverService {
  readonly settings: HandoverSettings;
  private readonly dispatcher: NdefDispatcher;
  private readonly manager: ConnectionHandoverManager;
  private readonly emptyHandler = new EmptyMessageHandler();
  private foreground: NdefMessage | null = null;

  /** Contract the exchanges run against: inbound messages re-enter the handler chain. */
  readonly exchangeContract: NdefExchangeContract = {
    handleNdef: (message) => this.dispatch(message),
    getForegroundNdefMessage: () => this.foreground,
  };

  constructor(settings: Partial<HandoverSettings> = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    const { dispatchConcurrency } = this.settings;
    this.dispatcher = new NdefDispatcher({
      concurrency: dispatchConcurrency > 0 ? dispatchConcurrency : undefined,
    });
    this.manager = new ConnectionHandoverManager(this.exchangeContract);
    if (!this.settings.handoverEnabled) {
      this.manager.disable();
    }
    this.installBuiltIns();
  }

  registerHandler(priority: number, handler: NdefHandler): void {
    this.dispatcher.register(priority, handler);
  }

  addHandler(handler: NdefHandler): void {
    this.dispatcher.register(
      isPrioritizedHandler(handler) ? handler.priority : DEFAULT_PRIORITY,
      handler
    );
  }

  unregisterHandler(handler: NdefHandler): boolean {
    return this.dispatcher.unregister(handler);
  }

  /**
   * Removes every application handler. The handover manager and the empty-message
   * handler are put back.
   */
  unregisterAll(): void {
    this.dispatcher.unregisterAll();
    this.installBuiltIns();
  }

  dispatch(message: NdefMessage): Promise<HandlerResult> {
    return this.dispatcher.dispatch(message);
  }

  setForegroundPayload(message: NdefMessage | null): void {
    this.foreground = message;
  }

  getForegroundPayload(): NdefMessage | null {
    return this.foreground;
  }

  enableConnectionHandover(): void {
    this.manager.enable();
  }

  disableConnectionHandover(): void {
    this.manager.disable();
  }

  isConnectionHandoverEnabled(): boolean {
    return this.manager.isEnabled();
  }

  addTcpHandover(port: number = this.settings.tcpPort): TcpPushHandover {
    const handover = new TcpPushHandover(port);
    this.manager.addConnectionHandover(handover);
    return handover;
  }

  addBluetoothHandover(adapter: BluetoothAdapter): BluetoothPushHandover {
    const handover = new BluetoothPushHandover(adapter);
    this.manager.addConnectionHandover(handover);
    return handover;
  }

  /**
   * Registers a symmetric pairing connector that listens under the configured
   * Bluetooth service name.
   */
  createBluetoothConnector(
    adapter: BluetoothAdapter,
    listener: OnConnectedListener,
    options: Omit<BluetoothConnectorOptions, 'adapter' | 'listener'> = {}
  ): BluetoothConnector {
    const connector = new BluetoothConnector({
      serviceName: this.settings.bluetoothServiceName,
      ...options,
      adapter,
      listener,
    });
    this.manager.addConnectionHandover(connector);
    return connector;
  }

  getConnectionHandoverManager(): ConnectionHandoverManager {
    return this.manager;
  }

  createPendingExchange(request: NdefMessage): PendingExchange {
    return new PendingExchange(request, this.manager);
  }

  createTcpListener(options: TcpHandoverListenerOptions = {}): TcpHandoverListener {
    return new TcpHandoverListener(this.exchangeContract, {
      port: this.settings.tcpPort,
      ...options,
    });
  }

  onIdle(): Promise<void> {
    return this.dispatcher.onIdle();
  }

  private installBuiltIns(): void {
    this.dispatcher.register(this.manager.priority, this.manager);
    this.dispatcher.register(this.emptyHandler.priority, this.emptyHandler);
    logger.debug('Installed connection handover and empty message handlers');
  }
}
