import type { HandlerResult } from '../../shared/types/handover';
import type { NdefMessage } from '../ndef/NdefMessage';

export const DEFAULT_PRIORITY = 50;
export const HANDOVER_PRIORITY = 5;
/**
 * Reserved band that runs after every other priority.
 */
export const FALLBACK_PRIORITY = 0;

/**
 * Consumer of inbound messages. Runs on a dispatch worker, so it may await I/O.
 */
export interface NdefHandler {
  handleNdef(message: NdefMessage): HandlerResult | Promise<HandlerResult>;
}

export interface PrioritizedHandler extends NdefHandler {
  readonly priority: number;
}

export function isPrioritizedHandler(handler: NdefHandler): handler is PrioritizedHandler {
  return 'priority' in handler && typeof handler.priority === 'number';
}
