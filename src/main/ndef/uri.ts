import { NdefFormatError } from '../errors';
import { NdefMessage } from './NdefMessage';
import { NdefRecord, RTD_URI, Tnf } from './NdefRecord';

/**
 * URI identifier codes of the NFC Forum URI record type. The first payload byte of a
 * well-known `U` record indexes this table.
 */
export const URI_PREFIXES: readonly string[] = [
  '',
  'http://www.',
  'https://www.',
  'http://',
  'https://',
  'tel:',
  'mailto:',
  'ftp://anonymous:anonymous@',
  'ftp://ftp.',
  'ftps://',
  'sftp://',
  'smb://',
  'nfs://',
  'ftp://',
  'dav://',
  'news:',
  'telnet://',
  'imap:',
  'rtsp://',
  'urn:',
  'pop:',
  'sip:',
  'sips:',
  'tftp:',
  'btspp://',
  'btl2cap://',
  'btgoep://',
  'tcpobex://',
  'irdaobex://',
  'file://',
  'urn:epc:id:',
  'urn:epc:tag:',
  'urn:epc:pat:',
  'urn:epc:raw:',
  'urn:epc:',
  'urn:nfc:',
];

export interface ParsedUri {
  scheme: string | null;
  authority: string | null;
  host: string | null;
  port: number | null;
  path: string;
  query: string | null;
  fragment: string | null;
}

// RFC 3986, appendix B.
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

/**
 * Splits a URI into its components. Unlike WHATWG `URL`, authorities such as
 * `00:11:22:33:44:55` are accepted as-is; a port is only extracted when the part after
 * the last colon is numeric and the host is not itself colon-separated.
 */
export function parseUri(text: string): ParsedUri {
  const match = URI_PATTERN.exec(text);
  if (!match) {
    throw new NdefFormatError(`Unparseable URI: ${text}`);
  }

  const [, scheme, authority, path, query, fragment] = match;
  let host: string | null = null;
  let port: number | null = null;

  if (authority !== undefined) {
    const withoutUser = authority.slice(authority.lastIndexOf('@') + 1);
    const portMatch = /^([^:]*):(\d+)$/.exec(withoutUser);
    if (portMatch) {
      host = portMatch[1];
      port = Number.parseInt(portMatch[2], 10);
    } else if (withoutUser.startsWith('[') && withoutUser.includes(']')) {
      const end = withoutUser.indexOf(']');
      host = withoutUser.slice(1, end);
      const rest = withoutUser.slice(end + 1);
      port = /^:\d+$/.test(rest) ? Number.parseInt(rest.slice(1), 10) : null;
    } else {
      host = withoutUser;
    }
  }

  return {
    scheme: scheme === undefined ? null : scheme.toLowerCase(),
    authority: authority ?? null,
    host,
    port,
    path: path ?? '',
    query: query ?? null,
    fragment: fragment ?? null,
  };
}

export function getQueryParameter(uri: ParsedUri, name: string): string | null {
  if (!uri.query) {
    return null;
  }
  for (const pair of uri.query.split('&')) {
    const separator = pair.indexOf('=');
    const key = separator === -1 ? pair : pair.slice(0, separator);
    if (decodeURIComponent(key) === name) {
      return separator === -1 ? '' : decodeURIComponent(pair.slice(separator + 1));
    }
  }
  return null;
}

export function isUriRecord(record: NdefRecord): boolean {
  return record.tnf === Tnf.ABSOLUTE_URI || record.hasType(Tnf.WELL_KNOWN, RTD_URI);
}

/**
 * Returns the URI carried by an absolute-URI or well-known URI record.
 */
export function parseRecordUri(record: NdefRecord): string {
  if (record.tnf === Tnf.ABSOLUTE_URI) {
    const payload = record.payload;
    return (payload.length > 0 ? payload : record.type).toString('utf-8');
  }

  if (record.hasType(Tnf.WELL_KNOWN, RTD_URI)) {
    const payload = record.payload;
    if (payload.length === 0) {
      throw new NdefFormatError('URI record has an empty payload');
    }
    const prefix = URI_PREFIXES[payload[0]];
    if (prefix === undefined) {
      throw new NdefFormatError(`Unknown URI prefix: ${payload[0]}`);
    }
    return prefix + payload.subarray(1).toString('utf-8');
  }

  throw new NdefFormatError('Record is not a URI record', { tnf: record.tnf });
}

/**
 * Well-known `U` record with the first matching table prefix compacted into one byte.
 */
export function createUriRecord(uri: string): NdefRecord {
  let code = 0;
  for (let i = 1; i < URI_PREFIXES.length; i++) {
    if (uri.startsWith(URI_PREFIXES[i])) {
      code = i;
      break;
    }
  }
  const rest = Buffer.from(uri.slice(URI_PREFIXES[code].length), 'utf-8');
  const payload = Buffer.concat([Buffer.from([code]), rest]);
  return new NdefRecord(Tnf.WELL_KNOWN, RTD_URI, undefined, payload);
}

export function createAbsoluteUriRecord(uri: string): NdefRecord {
  return new NdefRecord(Tnf.ABSOLUTE_URI, RTD_URI, undefined, uri);
}

export function createMimeRecord(mimeType: string, data: Uint8Array | string): NdefRecord {
  return new NdefRecord(Tnf.MIME_MEDIA, Buffer.from(mimeType, 'ascii'), undefined, data);
}

export function createTextMessage(text: string): NdefMessage {
  return new NdefMessage([createMimeRecord('text/plain', text)]);
}

/**
 * A single well-known record with zero-length type, id and payload.
 */
export function createEmptyMessage(): NdefMessage {
  return new NdefMessage([new NdefRecord(Tnf.WELL_KNOWN)]);
}

export function isEmptyMessage(message: NdefMessage | null): boolean {
  return message === null || message.equals(createEmptyMessage());
}
