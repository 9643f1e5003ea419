import type { HandlerResult } from '../../shared/types/handover';
import type { NdefExchangeContract } from '../exchange/NdefExchange';
import { NdefMessage } from '../ndef/NdefMessage';
import type { NdefRecord } from '../ndef/NdefRecord';
import { logger } from '../utils/logger';
import { ConnectionHandover } from './ConnectionHandover';
import { locateHandoverRequest, unwrapUserspaceHandover } from './HandoverDetector';
import { HANDOVER_PRIORITY, PrioritizedHandler } from './NdefHandler';

const NO_EXCHANGE: NdefExchangeContract = {
  handleNdef: () => undefined,
  getForegroundNdefMessage: () => null,
};

export class ConnectionHandoverManager implements PrioritizedHandler {
  readonly priority = HANDOVER_PRIORITY;
  private readonly handovers = new Set<ConnectionHandover>();
  private enabled = true;

  constructor(private readonly exchange: NdefExchangeContract = NO_EXCHANGE) {}

  addConnectionHandover(handover: ConnectionHandover): void {
    this.handovers.add(handover);
  }

  removeConnectionHandover(handover: ConnectionHandover): boolean {
    return this.handovers.delete(handover);
  }

  clearConnectionHandovers(): void {
    this.handovers.clear();
  }

  getConnectionHandovers(): ConnectionHandover[] {
    return [...this.handovers];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  handleNdef(message: NdefMessage): Promise<HandlerResult> {
    return this.negotiate(message, this.exchange);
  }

  /**
   * Runs a handover for `message`, sending `outbound` instead of the foreground message.
   */
  attemptHandover(message: NdefMessage, outbound?: NdefMessage | null): Promise<HandlerResult> {
    if (outbound === undefined) {
      return this.negotiate(message, this.exchange);
    }
    return this.negotiate(message, {
      handleNdef: (received) => this.exchange.handleNdef(received),
      getForegroundNdefMessage: () => outbound,
    });
  }

  private async negotiate(
    message: NdefMessage,
    exchange: NdefExchangeContract
  ): Promise<HandlerResult> {
    if (!this.enabled) {
      return 'propagated';
    }

    const location = locateHandoverRequest(message);
    if (!location) {
      return 'propagated';
    }

    let request = message;
    let firstCandidate = location.index + 2;
    if (location.framing === 'userspace') {
      try {
        request = unwrapUserspaceHandover(message, location);
      } catch (error) {
        logger.error('Bad handover record.', { error });
        return 'propagated';
      }
      firstCandidate = 0;
    }

    // Snapshot so initiators added or removed mid-negotiation do not disturb the walk.
    const handovers = this.getConnectionHandovers();
    for (let i = firstCandidate; i < request.length; i++) {
      const candidate = request.records[i];
      for (const handover of handovers) {
        if (!this.supports(handover, candidate)) {
          continue;
        }
        try {
          logger.debug(`Attempting handover ${handover.constructor.name} on record ${i}`);
          await handover.doConnectionHandover(request, i, exchange);
          return 'consumed';
        } catch (error) {
          logger.warn('Handover failed.', { record: i, error });
        }
      }
    }

    logger.warn('Handover request found but no transport could handle it', {
      candidates: Math.max(request.length - firstCandidate, 0),
      transports: handovers.length,
    });
    return 'propagated';
  }

  private supports(handover: ConnectionHandover, record: NdefRecord): boolean {
    try {
      return handover.supportsRequest(record);
    } catch (error) {
      logger.debug('Handover support check failed', { error });
      return false;
    }
  }
}
