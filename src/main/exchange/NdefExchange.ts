import { EventEmitter } from 'events';
import type { Writable } from 'stream';
import type { DuplexSocket } from '../comm/DuplexSocket';
import { NdefMessage } from '../ndef/NdefMessage';
import { logger } from '../utils/logger';
import { encodeFrame, readFrame } from './frame';

/**
 * How an exchange reaches the rest of the application: where the outbound message comes
 * from and where a received one goes.
 */
export interface NdefExchangeContract {
  handleNdef(message: NdefMessage): unknown;
  getForegroundNdefMessage(): NdefMessage | null;
}

export type ExchangeDirection = 'read' | 'write';

export type ExchangeState = 'pending' | 'read-done' | 'write-done' | 'both-done';

export interface ExchangeOutcome {
  connected: boolean;
  sent: boolean;
  received: NdefMessage | null;
  readError?: unknown;
  writeError?: unknown;
}

function writeFully(output: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * One length-framed message exchange over a duplex socket. The read and write
 * directions run concurrently; whichever finishes second closes the socket.
 */
export class NdefExchange extends EventEmitter {
  private state: ExchangeState = 'pending';
  private closing: Promise<void> | null = null;

  constructor(
    private readonly socket: DuplexSocket,
    private readonly contract: NdefExchangeContract
  ) {
    super();
  }

  get currentState(): ExchangeState {
    return this.state;
  }

  async run(): Promise<ExchangeOutcome> {
    try {
      await this.socket.connect();
      // Fail here, before either direction starts, if the streams are unavailable.
      this.socket.getInputStream();
      this.socket.getOutputStream();
    } catch (error) {
      logger.error('Exchange socket could not be opened', { error });
      return { connected: false, sent: false, received: null, readError: error };
    }

    const outcome: ExchangeOutcome = { connected: true, sent: false, received: null };

    const writeTask = this.write()
      .then(() => {
        outcome.sent = true;
      })
      .catch((error: unknown) => {
        outcome.writeError = error;
        logger.error('Error writing to socket', { error });
      })
      .finally(() => this.complete('write'));

    const readTask = this.read()
      .then((message) => {
        outcome.received = message;
      })
      .catch((error: unknown) => {
        outcome.readError = error;
        logger.error('Failed to read handover exchange', { error });
      })
      .finally(() => this.complete('read'));

    await Promise.all([writeTask, readTask]);
    await this.closing;
    this.emit('complete', outcome);
    return outcome;
  }

  private async write(): Promise<void> {
    const outbound = this.contract.getForegroundNdefMessage();
    const frame = encodeFrame(outbound ? outbound.toBytes() : null);
    await writeFully(this.socket.getOutputStream(), frame);
  }

  private async read(): Promise<NdefMessage | null> {
    const payload = await readFrame(this.socket.getInputStream());
    if (payload.length === 0) {
      return null;
    }
    const message = NdefMessage.fromBytes(payload);
    this.emit('message', message);
    try {
      await this.contract.handleNdef(message);
    } catch (error) {
      logger.error('Received message could not be delivered', { error });
    }
    return message;
  }

  private complete(direction: ExchangeDirection): void {
    const next = this.transition(direction);
    if (next === this.state) {
      return;
    }
    this.state = next;
    if (next === 'both-done') {
      this.closing = this.socket.close().catch((error: unknown) => {
        logger.warn('Failed to close exchange socket', { error });
      });
    }
  }

  private transition(direction: ExchangeDirection): ExchangeState {
    switch (this.state) {
      case 'pending':
        return direction === 'read' ? 'read-done' : 'write-done';
      case 'read-done':
        return direction === 'write' ? 'both-done' : 'read-done';
      case 'write-done':
        return direction === 'read' ? 'both-done' : 'write-done';
      default:
        return this.state;
    }
  }
}
