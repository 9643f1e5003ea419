import { validate as isUuid } from 'uuid';
import type { BluetoothAdapter } from '../../comm/BluetoothAdapter';
import { BluetoothDuplexSocket } from '../../comm/BluetoothDuplexSocket';
import { NdefFormatError } from '../../errors';
import { NdefExchange, NdefExchangeContract } from '../../exchange/NdefExchange';
import type { NdefMessage } from '../../ndef/NdefMessage';
import { logger } from '../../utils/logger';
import { UriSchemeHandover } from './UriSchemeHandover';

export const BLUETOOTH_HANDOVER_SCHEME = 'ndef+bluetooth';

export class BluetoothPushHandover extends UriSchemeHandover {
  constructor(private readonly adapter: BluetoothAdapter) {
    super(BLUETOOTH_HANDOVER_SCHEME);
  }

  async doConnectionHandover(
    message: NdefMessage,
    candidateIndex: number,
    exchange: NdefExchangeContract
  ): Promise<void> {
    const uri = this.candidateUri(message, candidateIndex);
    const address = uri.authority;
    const uuid = uri.path.slice(1);
    if (!address) {
      throw new NdefFormatError('Bluetooth handover uri has no device address', { candidateIndex });
    }
    if (!isUuid(uuid)) {
      throw new NdefFormatError(`Invalid service uuid: ${uuid}`, { candidateIndex });
    }

    const socket = new BluetoothDuplexSocket(this.adapter, address, { uuid });
    await socket.connect();
    logger.info(`Bluetooth handover connected to ${address}`);

    void new NdefExchange(socket, exchange).run();
  }
}
