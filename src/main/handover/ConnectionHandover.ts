import type { NdefExchangeContract } from '../exchange/NdefExchange';
import type { NdefMessage } from '../ndef/NdefMessage';
import type { NdefRecord } from '../ndef/NdefRecord';

/**
 * A transport that can carry a connection handover.
 */
export interface ConnectionHandover {
  supportsRequest(record: NdefRecord): boolean;
  /**
   * Opens the transport described by `message.records[candidateIndex]`. Rejects when the
   * transport cannot be established, letting the manager try the next candidate.
   */
  doConnectionHandover(
    message: NdefMessage,
    candidateIndex: number,
    exchange: NdefExchangeContract
  ): Promise<void>;
}
