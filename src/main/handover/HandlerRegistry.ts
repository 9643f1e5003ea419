import { EventEmitter } from 'events';
import { FALLBACK_PRIORITY, NdefHandler } from './NdefHandler';

export interface HandlerEntry {
  priority: number;
  handler: NdefHandler;
  sequence: number;
}

function rank(priority: number): number {
  return priority === FALLBACK_PRIORITY ? Number.POSITIVE_INFINITY : priority;
}

function compareEntries(a: HandlerEntry, b: HandlerEntry): number {
  const byPriority = rank(a.priority) - rank(b.priority);
  if (byPriority !== 0 && !Number.isNaN(byPriority)) {
    return byPriority;
  }
  return a.sequence - b.sequence;
}

/**
 * Priority-ordered handler list, kept sorted on insert. Same-priority handlers keep
 * their registration order.
 */
export class HandlerRegistry extends EventEmitter {
  private entries: HandlerEntry[] = [];
  private sequence = 0;

  get size(): number {
    return this.entries.length;
  }

  register(priority: number, handler: NdefHandler): void {
    if (!Number.isFinite(priority)) {
      throw new Error(`Handler priority must be a finite number, got ${priority}`);
    }
    if (this.entries.some((entry) => entry.priority === priority && entry.handler === handler)) {
      return;
    }

    const entry: HandlerEntry = { priority, handler, sequence: this.sequence++ };
    const next = [...this.entries];
    const position = next.findIndex((existing) => compareEntries(entry, existing) < 0);
    next.splice(position === -1 ? next.length : position, 0, entry);
    // Replace instead of mutating so snapshots held by running dispatches stay intact.
    this.entries = next;
    this.emit('registered', entry);
  }

  unregister(handler: NdefHandler): boolean {
    const next = this.entries.filter((entry) => entry.handler !== handler);
    const removed = next.length !== this.entries.length;
    this.entries = next;
    if (removed) {
      this.emit('unregistered', handler);
    }
    return removed;
  }

  unregisterAll(): void {
    this.entries = [];
    this.emit('cleared');
  }

  snapshot(): readonly HandlerEntry[] {
    return this.entries;
  }
}
