/**
 * Debouncer
 *
 * Coalesces bursts of change events into single triggers. Each ingest
 * restarts the quiet-period timer; when it elapses, exactly one trigger is
 * emitted for everything ingested since the previous one.
 */

import { EventEmitter } from 'events';

export interface ChangeEvent {
  path: string;
  timestamp: number;
}

export interface Trigger {
  timestamp: number;
  /** Number of change events coalesced into this trigger */
  eventCount: number;
  /** Distinct changed paths, in first-seen order */
  paths: string[];
}

export class Debouncer extends EventEmitter {
  private readonly delayMs: number;
  private timer: NodeJS.Timeout | null = null;
  private eventCount = 0;
  private paths: Set<string> = new Set();
  private disposed = false;

  constructor(delayMs: number) {
    super();
    this.delayMs = Math.max(0, delayMs);
  }

  getDelayMs(): number {
    return this.delayMs;
  }

  ingest(event: ChangeEvent): void {
    if (this.disposed) {
      return;
    }
    this.eventCount++;
    this.paths.add(event.path);

    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.fire(), this.delayMs);
  }

  /**
   * Emit the pending trigger now instead of waiting out the quiet period
   */
  flush(): boolean {
    if (this.eventCount === 0) {
      return false;
    }
    this.fire();
    return true;
  }

  pendingCount(): number {
    return this.eventCount;
  }

  onTrigger(listener: (trigger: Trigger) => void): () => void {
    this.on('trigger', listener);
    return () => this.off('trigger', listener);
  }

  dispose(): void {
    this.disposed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.eventCount = 0;
    this.paths.clear();
    this.removeAllListeners();
  }

  private fire(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const trigger: Trigger = {
      timestamp: Date.now(),
      eventCount: this.eventCount,
      paths: [...this.paths],
    };
    this.eventCount = 0;
    this.paths = new Set();
    this.emit('trigger', trigger);
  }
}
