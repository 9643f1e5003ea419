import { describe, it, expect } from '@jest/globals';

import { NdefFormatError } from '../../src/main/errors';
import {
  HANDOVER_REQUEST_VERSION,
  USERSPACE_HANDOVER_PREFIX,
  createHandoverRequest,
  createUserspaceHandover,
  fromUserspaceUri,
  isHandoverRequest,
  locateHandoverRequest,
  toUserspaceUri,
  unwrapUserspaceHandover,
} from '../../src/main/handover/HandoverDetector';
import { NdefMessage } from '../../src/main/ndef/NdefMessage';
import {
  RTD_COLLISION_RESOLUTION,
  RTD_HANDOVER_REQUEST,
  Tnf,
} from '../../src/main/ndef/NdefRecord';
import {
  createAbsoluteUriRecord,
  createTextMessage,
  createUriRecord,
  parseRecordUri,
} from '../../src/main/ndef/uri';

const NONCE = Buffer.from([0x00, 0x01]);

describe('createHandoverRequest', () => {
  it('lays out Hr, cr and one record per candidate', () => {
    const request = createHandoverRequest(['ndef+tcp://10.0.0.5:7924', 'ndef+tcp://h2'], NONCE);

    expect(request.length).toBe(4);
    expect(request.records[0].hasType(Tnf.WELL_KNOWN, RTD_HANDOVER_REQUEST)).toBe(true);
    expect(request.records[0].payload).toEqual(Buffer.from([0x12]));
    expect(HANDOVER_REQUEST_VERSION).toBe(0x12);
    expect(request.records[1].hasType(Tnf.WELL_KNOWN, RTD_COLLISION_RESOLUTION)).toBe(true);
    expect(request.records[1].payload).toEqual(NONCE);
    expect(request.records[2].tnf).toBe(Tnf.ABSOLUTE_URI);
    expect(parseRecordUri(request.records[3])).toBe('ndef+tcp://h2');
  });
});

describe('locateHandoverRequest', () => {
  it('finds a well-known handover record', () => {
    const request = createHandoverRequest(['ndef+tcp://a'], NONCE);

    expect(locateHandoverRequest(request)).toEqual({ framing: 'well-known', index: 0 });
    expect(isHandoverRequest(request)).toBe(true);
  });

  it('reports the index of an Hr record that is not first', () => {
    const request = createHandoverRequest(['ndef+tcp://a'], NONCE);
    const message = new NdefMessage([createTextMessage('x').records[0], ...request.records]);

    expect(locateHandoverRequest(message)).toEqual({ framing: 'well-known', index: 1 });
    expect(isHandoverRequest(message)).toBe(false);
  });

  it('finds a userspace envelope in an absolute-URI record', () => {
    const envelope = createUserspaceHandover(createHandoverRequest(['ndef+tcp://a'], NONCE));

    expect(locateHandoverRequest(envelope)).toEqual({
      framing: 'userspace',
      index: 0,
      recordIndex: 0,
    });
  });

  it('finds a userspace envelope in a well-known URI record', () => {
    const uri = toUserspaceUri(createHandoverRequest(['ndef+tcp://a'], NONCE));
    const message = new NdefMessage([createTextMessage('x').records[0], createUriRecord(uri)]);

    expect(locateHandoverRequest(message)).toEqual({
      framing: 'userspace',
      index: 0,
      recordIndex: 1,
    });
  });

  it('prefers the well-known record over an envelope', () => {
    const request = createHandoverRequest(['ndef+tcp://a'], NONCE);
    const message = new NdefMessage([
      createAbsoluteUriRecord(toUserspaceUri(request)),
      ...request.records,
    ]);

    expect(locateHandoverRequest(message)).toEqual({ framing: 'well-known', index: 1 });
  });

  it('returns null for ordinary messages', () => {
    expect(locateHandoverRequest(createTextMessage('hello'))).toBeNull();
    expect(
      locateHandoverRequest(new NdefMessage([createAbsoluteUriRecord('https://example.com')]))
    ).toBeNull();
  });
});

describe('userspace envelope', () => {
  const request = createHandoverRequest(['ndef+tcp://10.0.0.5:7924'], NONCE);

  it('starts with the userspace prefix and unwraps to the same message', () => {
    const envelope = createUserspaceHandover(request);
    const location = locateHandoverRequest(envelope);

    expect(toUserspaceUri(request).startsWith(USERSPACE_HANDOVER_PREFIX)).toBe(true);
    expect(location?.framing).toBe('userspace');
    if (location?.framing !== 'userspace') {
      return;
    }
    expect(unwrapUserspaceHandover(envelope, location).equals(request)).toBe(true);
  });

  it('accepts the standard alphabet, padding and whitespace', () => {
    const body = request.toBytes().toString('base64');
    const padded = body.padEnd(Math.ceil(body.length / 4) * 4, '=');
    const spaced = `${padded.slice(0, 8)}\n ${padded.slice(8)}`;

    expect(fromUserspaceUri(`${USERSPACE_HANDOVER_PREFIX}${spaced}`).equals(request)).toBe(true);
  });

  it('rejects other schemes, bad base64 and bytes that are not a message', () => {
    expect(() => fromUserspaceUri('https://wkt:hr/AAAA')).toThrow(NdefFormatError);
    expect(() => fromUserspaceUri(`${USERSPACE_HANDOVER_PREFIX}!!!`)).toThrow(
      'Userspace handover payload is not base64'
    );
    expect(() => fromUserspaceUri(`${USERSPACE_HANDOVER_PREFIX}AAAA`)).toThrow(
      'Userspace handover payload is not an NDEF message'
    );
  });
});
