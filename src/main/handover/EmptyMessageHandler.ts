import type { HandlerResult } from '../../shared/types/handover';
import type { NdefMessage } from '../ndef/NdefMessage';
import { isEmptyMessage } from '../ndef/uri';
import { FALLBACK_PRIORITY, PrioritizedHandler } from './NdefHandler';

/**
 * Swallows the empty sentinel message so it never reaches application handlers as content.
 */
export class EmptyMessageHandler implements PrioritizedHandler {
  readonly priority = FALLBACK_PRIORITY;

  handleNdef(message: NdefMessage): HandlerResult {
    return isEmptyMessage(message) ? 'consumed' : 'propagated';
  }
}
