import type { HandlerResult } from '../../shared/types/handover';
import type { NdefMessage } from '../ndef/NdefMessage';
import type { ConnectionHandoverManager } from './ConnectionHandoverManager';

/**
 * A received handover request parked until the application knows what to send back.
 * Can be completed once.
 */
export class PendingExchange {
  private completed = false;

  constructor(
    readonly request: NdefMessage,
    private readonly manager: ConnectionHandoverManager
  ) {}

  get isCompleted(): boolean {
    return this.completed;
  }

  exchange(outbound: NdefMessage | null): Promise<HandlerResult> {
    if (this.completed) {
      return Promise.reject(new Error('Pending exchange already completed'));
    }
    this.completed = true;
    return this.manager.attemptHandover(this.request, outbound);
  }
}
