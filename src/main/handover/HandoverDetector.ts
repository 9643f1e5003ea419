import { NdefFormatError } from '../errors';
import { NdefMessage } from '../ndef/NdefMessage';
import {
  NdefRecord,
  RTD_COLLISION_RESOLUTION,
  RTD_HANDOVER_REQUEST,
  RTD_URI,
  Tnf,
} from '../ndef/NdefRecord';
import { createAbsoluteUriRecord, isUriRecord, parseRecordUri, parseUri } from '../ndef/uri';
import { generateNonce } from './pairing/collision';

export const USERSPACE_HANDOVER_PREFIX = 'ndef://wkt:hr/';
// Connection handover 1.2
export const HANDOVER_REQUEST_VERSION = (0x1 << 4) | 0x2;

export type HandoverLocation =
  | { framing: 'well-known'; index: number }
  | { framing: 'userspace'; index: 0; recordIndex: number };

function isHandoverRequestRecord(record: NdefRecord): boolean {
  return record.hasType(Tnf.WELL_KNOWN, RTD_HANDOVER_REQUEST);
}

function isUserspaceRecord(record: NdefRecord): boolean {
  if (!isUriRecord(record)) {
    return false;
  }
  try {
    return parseRecordUri(record).startsWith(USERSPACE_HANDOVER_PREFIX);
  } catch {
    return false;
  }
}

/**
 * Finds the handover request carried by a message, preferring the well-known `Hr`
 * record over the `ndef://wkt:hr/` userspace envelope. Returns null for ordinary
 * messages.
 */
export function locateHandoverRequest(message: NdefMessage): HandoverLocation | null {
  const index = message.records.findIndex(isHandoverRequestRecord);
  if (index !== -1) {
    return { framing: 'well-known', index };
  }

  const recordIndex = message.records.findIndex(isUserspaceRecord);
  if (recordIndex !== -1) {
    return { framing: 'userspace', index: 0, recordIndex };
  }

  return null;
}

export function isHandoverRequest(message: NdefMessage): boolean {
  return message.length >= 3 && isHandoverRequestRecord(message.records[0]);
}

/**
 * Builds `[Hr, cr, ...candidates]`: the handover record, the collision nonce, then one
 * absolute-URI record per transport candidate.
 */
export function createHandoverRequest(
  candidates: readonly string[],
  nonce: Uint8Array = generateNonce()
): NdefMessage {
  return new NdefMessage([
    new NdefRecord(
      Tnf.WELL_KNOWN,
      RTD_HANDOVER_REQUEST,
      undefined,
      Buffer.from([HANDOVER_REQUEST_VERSION])
    ),
    new NdefRecord(Tnf.WELL_KNOWN, RTD_COLLISION_RESOLUTION, undefined, nonce),
    ...candidates.map(createAbsoluteUriRecord),
  ]);
}

export function toUserspaceUri(message: NdefMessage): string {
  return USERSPACE_HANDOVER_PREFIX + message.toBytes().toString('base64url');
}

export function createUserspaceHandover(message: NdefMessage): NdefMessage {
  return new NdefMessage([
    new NdefRecord(Tnf.ABSOLUTE_URI, RTD_URI, undefined, toUserspaceUri(message)),
  ]);
}

const BASE64_BODY = /^[A-Za-z0-9+/_-]+={0,2}$/;

export function fromUserspaceUri(uri: string): NdefMessage {
  const parsed = parseUri(uri);
  if (parsed.scheme !== 'ndef') {
    throw new NdefFormatError(`Not an ndef:// uri: ${uri}`);
  }

  // The authority of `ndef://wkt:hr/` is not a host, so take the path after it.
  const encoded = parsed.path.slice(1).replace(/\s+/g, '');
  if (!BASE64_BODY.test(encoded)) {
    throw new NdefFormatError('Userspace handover payload is not base64', { uri });
  }

  try {
    return NdefMessage.fromBytes(Buffer.from(encoded, 'base64url'));
  } catch (error) {
    throw new NdefFormatError('Userspace handover payload is not an NDEF message', { uri }, {
      cause: error,
    });
  }
}

export function unwrapUserspaceHandover(
  message: NdefMessage,
  location: Extract<HandoverLocation, { framing: 'userspace' }>
): NdefMessage {
  return fromUserspaceUri(parseRecordUri(message.records[location.recordIndex]));
}
