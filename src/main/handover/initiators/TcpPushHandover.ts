import { TcpDuplexSocket } from '../../comm/TcpDuplexSocket';
import { NdefFormatError } from '../../errors';
import { NdefExchange, NdefExchangeContract } from '../../exchange/NdefExchange';
import type { NdefMessage } from '../../ndef/NdefMessage';
import { logger } from '../../utils/logger';
import { UriSchemeHandover } from './UriSchemeHandover';

export const TCP_HANDOVER_SCHEME = 'ndef+tcp';
export const DEFAULT_TCP_HANDOVER_PORT = 7924;

/**
 * Pushes the foreground message to a peer listening on `ndef+tcp://host[:port]`.
 */
export class TcpPushHandover extends UriSchemeHandover {
  constructor(private readonly defaultPort: number = DEFAULT_TCP_HANDOVER_PORT) {
    super(TCP_HANDOVER_SCHEME);
  }

  async doConnectionHandover(
    message: NdefMessage,
    candidateIndex: number,
    exchange: NdefExchangeContract
  ): Promise<void> {
    const uri = this.candidateUri(message, candidateIndex);
    if (!uri.host) {
      throw new NdefFormatError('TCP handover uri has no host', { candidateIndex });
    }
    const port = uri.port ?? this.defaultPort;

    const socket = new TcpDuplexSocket(uri.host, port);
    await socket.connect();
    logger.info(`TCP handover connected to ${uri.host}:${port}`);

    void new NdefExchange(socket, exchange).run();
  }
}
