export * from '../shared/types/handover';
export * from './errors';
export * from './ndef/NdefRecord';
export * from './ndef/NdefMessage';
export * from './ndef/uri';
export * from './handover/HandoverDetector';
export * from './handover/NdefHandler';
export * from './handover/HandlerRegistry';
export * from './handover/NdefDispatcher';
export * from './handover/EmptyMessageHandler';
export * from './handover/ConnectionHandover';
export * from './handover/ConnectionHandoverManager';
export * from './handover/PendingExchange';
export * from './handover/HandoverService';
export * from './handover/initiators/UriSchemeHandover';
export * from './handover/initiators/TcpPushHandover';
export * from './handover/initiators/BluetoothPushHandover';
export * from './handover/pairing/collision';
export * from './handover/pairing/BluetoothConnector';
export * from './comm/DuplexSocket';
export * from './comm/StreamDuplexSocket';
export * from './comm/TcpDuplexSocket';
export * from './comm/BluetoothAdapter';
export * from './comm/BluetoothDuplexSocket';
export * from './comm/TcpHandoverListener';
export * from './exchange/frame';
export * from './exchange/NdefExchange';
export * from './config/settingsStore';
export { logger, initializeLogger } from './utils/logger';
