import type { Duplex } from 'stream';

export type RfcommTarget = { uuid: string } | { channel: number };

export interface BluetoothServerSocket {
  /** RFCOMM channel the server listens on, when the binding exposes it. */
  readonly channel: number | null;
  accept(): Promise<Duplex>;
  close(): Promise<void>;
}

/**
 * The host's RFCOMM binding. The handover stack only needs to dial a peer and to open
 * one listening socket; radio power, discovery and permissions stay with the host.
 */
export interface BluetoothAdapter {
  readonly address: string;
  connect(address: string, target: RfcommTarget): Promise<Duplex>;
  listen(serviceName: string, uuid: string): Promise<BluetoothServerSocket>;
}
