import type { NdefExchangeContract } from '../../exchange/NdefExchange';
import type { NdefMessage } from '../../ndef/NdefMessage';
import type { NdefRecord } from '../../ndef/NdefRecord';
import { isUriRecord, parseRecordUri, parseUri, ParsedUri } from '../../ndef/uri';
import { ConnectionHandover } from '../ConnectionHandover';

/**
 * Base for transports addressed by a URI candidate record, matched on the URI scheme.
 */
export abstract class UriSchemeHandover implements ConnectionHandover {
  constructor(readonly scheme: string) {}

  supportsRequest(record: NdefRecord): boolean {
    if (!isUriRecord(record)) {
      return false;
    }
    try {
      return parseUri(parseRecordUri(record)).scheme === this.scheme;
    } catch {
      return false;
    }
  }

  abstract doConnectionHandover(
    message: NdefMessage,
    candidateIndex: number,
    exchange: NdefExchangeContract
  ): Promise<void>;

  protected candidateUri(message: NdefMessage, candidateIndex: number): ParsedUri {
    return parseUri(parseRecordUri(message.records[candidateIndex]));
  }

  toString(): string {
    return `${this.constructor.name}(${this.scheme})`;
  }
}
