export type HandlerResult = 'consumed' | 'propagated';

export type PeerRole = 'server' | 'client';

export type CollisionOutcome = PeerRole | 'draw';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface HandoverSettings {
  tcpPort: number;
  handoverEnabled: boolean;
  dispatchConcurrency: number;
  bluetoothServiceName: string;
  logLevel: LogLevel;
}
