import PQueue from 'p-queue';
import type { HandlerResult } from '../../shared/types/handover';
import type { NdefMessage } from '../ndef/NdefMessage';
import { logger } from '../utils/logger';
import { HandlerRegistry } from './HandlerRegistry';
import { NdefHandler } from './NdefHandler';

export interface NdefDispatcherOptions {
  concurrency?: number;
}

/**
 * Runs every inbound message through the handler chain on its own queue task, so a
 * handler blocked on a socket never holds up the caller.
 */
export class NdefDispatcher {
  readonly registry = new HandlerRegistry();
  private readonly queue: PQueue;

  constructor(options: NdefDispatcherOptions = {}) {
    this.queue = new PQueue({ concurrency: options.concurrency ?? Number.POSITIVE_INFINITY });
  }

  register(priority: number, handler: NdefHandler): void {
    this.registry.register(priority, handler);
  }

  unregister(handler: NdefHandler): boolean {
    return this.registry.unregister(handler);
  }

  unregisterAll(): void {
    this.registry.unregisterAll();
  }

  dispatch(message: NdefMessage): Promise<HandlerResult> {
    return this.queue.add(() => this.runChain(message));
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  private async runChain(message: NdefMessage): Promise<HandlerResult> {
    const entries = this.registry.snapshot();
    const invoked = new Set<NdefHandler>();

    for (const { priority, handler } of entries) {
      if (invoked.has(handler)) {
        continue;
      }
      invoked.add(handler);

      try {
        if ((await handler.handleNdef(message)) === 'consumed') {
          logger.debug(`Message consumed at priority ${priority}`);
          return 'consumed';
        }
      } catch (error) {
        logger.error('NDEF handler failed', { priority, error });
      }
    }

    return 'propagated';
  }
}
