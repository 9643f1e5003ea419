import { describe, it, expect, jest } from '@jest/globals';

import type { PeerRole } from '../../src/shared/types/handover';
import type { DuplexSocket } from '../../src/main/comm/DuplexSocket';
import { NdefFormatError } from '../../src/main/errors';
import { NdefExchange, NdefExchangeContract } from '../../src/main/exchange/NdefExchange';
import { ConnectionHandoverManager } from '../../src/main/handover/ConnectionHandoverManager';
import { createHandoverRequest } from '../../src/main/handover/HandoverDetector';
import {
  BluetoothConnector,
  OnConnectedListener,
} from '../../src/main/handover/pairing/BluetoothConnector';
import { NdefMessage } from '../../src/main/ndef/NdefMessage';
import {
  NdefRecord,
  RTD_COLLISION_RESOLUTION,
  RTD_HANDOVER_REQUEST,
  Tnf,
} from '../../src/main/ndef/NdefRecord';
import {
  createAbsoluteUriRecord,
  createTextMessage,
  parseRecordUri,
} from '../../src/main/ndef/uri';
import { logger } from '../../src/main/utils/logger';
import { InMemoryBluetoothNetwork } from '../helpers/inMemoryBluetooth';

jest.mock('../../src/main/utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const ADDRESS_A = '00:11:22:33:44:01';
const ADDRESS_B = '00:11:22:33:44:02';
const UUID_A = '6f1c2a3e-4b5d-4e6f-8a9b-0c1d2e3f4a5b';
const UUID_B = '7a2d3b4f-5c6e-4f70-9bac-1d2e3f4a5b6c';

interface Connection {
  socket: DuplexSocket;
  role: PeerRole;
}

const createListener = () => {
  let resolveConnection: (connection: Connection) => void = () => undefined;
  const connected = new Promise<Connection>((resolve) => {
    resolveConnection = resolve;
  });
  const listener = {
    beforeConnect: jest.fn<OnConnectedListener['beforeConnect']>(),
    onConnectionEstablished: jest.fn((socket: DuplexSocket, role: PeerRole) => {
      resolveConnection({ socket, role });
    }),
    onCollisionDraw: jest.fn<() => void>(),
  };
  return { listener, connected };
};

const collectingContract = (outbound: NdefMessage) => {
  const received: NdefMessage[] = [];
  const contract: NdefExchangeContract = {
    handleNdef: (message) => {
      received.push(message);
    },
    getForegroundNdefMessage: () => outbound,
  };
  return { contract, received };
};

const managerFor = (connector: BluetoothConnector) => {
  const manager = new ConnectionHandoverManager();
  manager.addConnectionHandover(connector);
  return manager;
};

describe('BluetoothConnector', () => {
  it('publishes Hr, cr and a btsocket candidate followed by application records', async () => {
    const network = new InMemoryBluetoothNetwork();
    const { listener } = createListener();
    const connector = new BluetoothConnector({
      adapter: network.createAdapter(ADDRESS_A),
      listener,
      serviceUuid: UUID_A,
      nonce: Buffer.from([0x00, 0x01]),
    });

    const request = await connector.prepare(createTextMessage('app').records);

    expect(request.length).toBe(4);
    expect(request.records[0].hasType(Tnf.WELL_KNOWN, RTD_HANDOVER_REQUEST)).toBe(true);
    expect(request.records[0].payload).toEqual(Buffer.from([0x12]));
    expect(request.records[1].hasType(Tnf.WELL_KNOWN, RTD_COLLISION_RESOLUTION)).toBe(true);
    expect(request.records[1].payload).toEqual(Buffer.from([0x00, 0x01]));
    expect(parseRecordUri(request.records[2])).toBe(
      `btsocket://${ADDRESS_A}/${UUID_A}?channel=1`
    );
    expect(request.records[3].payload.toString()).toBe('app');
    expect(connector.isListening).toBe(true);

    await connector.close();
  });

  it('pairs two symmetric peers: the smaller nonce serves, the other dials', async () => {
    const network = new InMemoryBluetoothNetwork();
    const adapterA = network.createAdapter(ADDRESS_A);
    const adapterB = network.createAdapter(ADDRESS_B);
    const peerA = createListener();
    const peerB = createListener();
    const connectorA = new BluetoothConnector({
      adapter: adapterA,
      listener: peerA.listener,
      serviceUuid: UUID_A,
      nonce: Buffer.from([0x00, 0x01]),
    });
    const connectorB = new BluetoothConnector({
      adapter: adapterB,
      listener: peerB.listener,
      serviceUuid: UUID_B,
      nonce: Buffer.from([0x00, 0x02]),
    });

    const requestA = await connectorA.prepare();
    const requestB = await connectorB.prepare();

    await expect(managerFor(connectorA).handleNdef(requestB)).resolves.toBe('consumed');
    await expect(managerFor(connectorB).handleNdef(requestA)).resolves.toBe('consumed');
    const [connectionA, connectionB] = await Promise.all([peerA.connected, peerB.connected]);

    expect(connectionA.role).toBe('server');
    expect(connectionB.role).toBe('client');
    expect(peerA.listener.beforeConnect).toHaveBeenCalledTimes(1);
    expect(peerA.listener.beforeConnect).toHaveBeenCalledWith('server');
    expect(peerB.listener.beforeConnect).toHaveBeenCalledTimes(1);
    expect(peerB.listener.beforeConnect).toHaveBeenCalledWith('client');
    expect(adapterB.connects).toEqual([{ address: ADDRESS_A, target: { channel: 1 } }]);
    expect(adapterA.servers[0].closed).toBe(true);
    expect(adapterB.servers[0].closed).toBe(true);
    expect(connectorA.negotiatedRole).toBe('server');

    const a = collectingContract(createTextMessage('hello from a'));
    const b = collectingContract(createTextMessage('hello from b'));
    await Promise.all([
      new NdefExchange(connectionA.socket, a.contract).run(),
      new NdefExchange(connectionB.socket, b.contract).run(),
    ]);

    expect(a.received[0].equals(createTextMessage('hello from b'))).toBe(true);
    expect(b.received[0].equals(createTextMessage('hello from a'))).toBe(true);
  });

  it('reports a draw and connects nothing when the nonces are equal', async () => {
    const network = new InMemoryBluetoothNetwork();
    const peerA = createListener();
    const peerB = createListener();
    const connectorA = new BluetoothConnector({
      adapter: network.createAdapter(ADDRESS_A),
      listener: peerA.listener,
      serviceUuid: UUID_A,
      nonce: Buffer.from([0x12, 0x34]),
    });
    const connectorB = new BluetoothConnector({
      adapter: network.createAdapter(ADDRESS_B),
      listener: peerB.listener,
      serviceUuid: UUID_B,
      nonce: Buffer.from([0x12, 0x34]),
    });
    await connectorA.prepare();
    const requestB = await connectorB.prepare();

    await managerFor(connectorA).handleNdef(requestB);

    expect(peerA.listener.onCollisionDraw).toHaveBeenCalledTimes(1);
    expect(peerA.listener.beforeConnect).not.toHaveBeenCalled();
    expect(connectorA.negotiatedRole).toBeNull();
    expect(connectorA.isListening).toBe(true);
    expect(connectorA.renewNonce()).toHaveLength(2);

    await Promise.all([connectorA.close(), connectorB.close()]);
  });

  it('always dials when configured as client only', async () => {
    const network = new InMemoryBluetoothNetwork();
    const adapterB = network.createAdapter(ADDRESS_B);
    const peerA = createListener();
    const peerB = createListener();
    const server = new BluetoothConnector({
      adapter: network.createAdapter(ADDRESS_A),
      listener: peerA.listener,
      serviceUuid: UUID_A,
      nonce: Buffer.from([0xff, 0xff]),
    });
    const request = await server.prepare();

    await expect(BluetoothConnector.join(adapterB, peerB.listener, request)).resolves.toBe(
      'consumed'
    );
    const [connectionA, connectionB] = await Promise.all([peerA.connected, peerB.connected]);

    expect(connectionA.role).toBe('server');
    expect(connectionB.role).toBe('client');
    expect(adapterB.servers).toHaveLength(0);
  });

  it('falls back to the service uuid when the channel cannot be reached', async () => {
    const network = new InMemoryBluetoothNetwork();
    const adapterA = network.createAdapter(ADDRESS_A);
    const adapterB = network.createAdapter(ADDRESS_B);
    const peerA = createListener();
    const peerB = createListener();
    const server = new BluetoothConnector({
      adapter: adapterA,
      listener: peerA.listener,
      serviceUuid: UUID_A,
    });
    await server.prepare();
    const staleRequest = createHandoverRequest([`btsocket://${ADDRESS_A}/${UUID_A}?channel=99`]);

    await BluetoothConnector.join(adapterB, peerB.listener, staleRequest);
    await Promise.all([peerA.connected, peerB.connected]);

    expect(adapterB.connects).toEqual([
      { address: ADDRESS_A, target: { channel: 99 } },
      { address: ADDRESS_A, target: { uuid: UUID_A } },
    ]);
  });

  it('dials by uuid when the peer published no channel', async () => {
    const network = new InMemoryBluetoothNetwork();
    const adapterA = network.createAdapter(ADDRESS_A, { exposeChannel: false });
    const adapterB = network.createAdapter(ADDRESS_B);
    const peerA = createListener();
    const peerB = createListener();
    const server = new BluetoothConnector({
      adapter: adapterA,
      listener: peerA.listener,
      serviceUuid: UUID_A,
    });
    const request = await server.prepare();

    expect(parseRecordUri(request.records[2])).toBe(`btsocket://${ADDRESS_A}/${UUID_A}`);
    await BluetoothConnector.join(adapterB, peerB.listener, request);
    await peerB.connected;

    expect(adapterB.connects).toEqual([{ address: ADDRESS_A, target: { uuid: UUID_A } }]);
  });

  it('fails the candidate when the peer cannot be reached', async () => {
    const network = new InMemoryBluetoothNetwork();
    const peerB = createListener();
    const request = createHandoverRequest([`btsocket://${ADDRESS_A}/${UUID_A}`]);

    await expect(
      BluetoothConnector.join(network.createAdapter(ADDRESS_B), peerB.listener, request)
    ).resolves.toBe('propagated');
    expect(peerB.listener.onConnectionEstablished).not.toHaveBeenCalled();
  });

  it('cannot resolve roles for a request without a collision record', async () => {
    const network = new InMemoryBluetoothNetwork();
    const { listener } = createListener();
    const connector = new BluetoothConnector({
      adapter: network.createAdapter(ADDRESS_A),
      listener,
      serviceUuid: UUID_A,
    });
    await connector.prepare();
    const request = new NdefMessage([
      new NdefRecord(Tnf.WELL_KNOWN, RTD_HANDOVER_REQUEST, undefined, Buffer.from([0x12])),
      createTextMessage('no nonce').records[0],
      createAbsoluteUriRecord(`btsocket://${ADDRESS_B}/${UUID_B}`),
    ]);

    await expect(managerFor(connector).handleNdef(request)).resolves.toBe('propagated');
    expect(listener.beforeConnect).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      'Handover failed.',
      expect.objectContaining({ error: expect.any(NdefFormatError) })
    );

    await connector.close();
  });

  it('rejects an invalid service uuid', () => {
    const network = new InMemoryBluetoothNetwork();

    expect(
      () =>
        new BluetoothConnector({
          adapter: network.createAdapter(ADDRESS_A),
          listener: createListener().listener,
          serviceUuid: 'not-a-uuid',
        })
    ).toThrow(NdefFormatError);
  });
});
