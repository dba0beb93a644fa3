/**
 * Reload Logger - phase transparency
 *
 * Every phase transition of a watch session produces one structured entry.
 * Entries are buffered in memory and pushed to subscribers (the console sink
 * in the CLI, collectors in tests).
 */

import { describeError } from '../errors/reforge-error';

export type ReloadLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ReloadLogCategory =
  | 'WATCH'
  | 'TRIGGER'
  | 'HOOK'
  | 'BUILD'
  | 'PROCESS'
  | 'STATE'
  | 'CONFIG'
  | 'ERROR';

export interface ReloadLogEntry {
  timestamp: string;
  level: ReloadLogLevel;
  category: ReloadLogCategory;
  message: string;
  details?: Record<string, unknown>;
  /** Orchestrator cycle number the entry belongs to */
  cycle?: number;
}

export interface ReloadLogSubscriber {
  onLog(entry: ReloadLogEntry): void;
}

export const LOG_LEVEL_ORDER: Record<ReloadLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ReloadLogger - centralized logging for session decisions
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent logs
 * - Subscriber pattern for real-time output
 */
export class ReloadLogger {
  private entries: ReloadLogEntry[] = [];
  private subscribers: Set<ReloadLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  log(
    level: ReloadLogLevel,
    category: ReloadLogCategory,
    message: string,
    options: { details?: Record<string, unknown>; cycle?: number } = {}
  ): ReloadLogEntry {
    const entry: ReloadLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      cycle: options.cycle,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Drop a sink that throws.
        this.subscribers.delete(subscriber);
        process.stderr.write(`reforge: log subscriber removed: ${describeError(error)}\n`);
      }
    }

    return entry;
  }

  // Convenience methods for each category

  logWatch(message: string, details?: Record<string, unknown>): ReloadLogEntry {
    return this.log('info', 'WATCH', message, { details });
  }

  logTrigger(eventCount: number, paths: string[]): ReloadLogEntry {
    return this.log('debug', 'TRIGGER', `change detected (${eventCount} event${eventCount === 1 ? '' : 's'})`, {
      details: {
        eventCount,
        paths: paths.slice(0, 10),
      },
    });
  }

  logHookResult(
    hook: string,
    ok: boolean,
    options: { cycle?: number; stepIndex?: number; status?: string; advisory?: boolean } = {}
  ): ReloadLogEntry {
    if (ok) {
      return this.log('debug', 'HOOK', `${hook} hook succeeded`, {
        details: { hook },
        cycle: options.cycle,
      });
    }
    const suffix = options.advisory ? ' (ignored)' : '';
    return this.log(
      options.advisory ? 'warn' : 'error',
      'HOOK',
      `${hook} hook failed at step ${options.stepIndex ?? 0}: ${options.status ?? 'unknown'}${suffix}`,
      {
        details: { hook, stepIndex: options.stepIndex, status: options.status },
        cycle: options.cycle,
      }
    );
  }

  logBuildStart(argv: string[], cycle?: number): ReloadLogEntry {
    return this.log('info', 'BUILD', `build: ${argv.join(' ')}`, {
      details: { argv },
      cycle,
    });
  }

  logBuildEnd(
    success: boolean,
    options: { cycle?: number; durationMs?: number; reason?: string } = {}
  ): ReloadLogEntry {
    return this.log(
      success ? 'info' : 'error',
      'BUILD',
      success ? 'build succeeded' : `build failed: ${options.reason ?? 'unknown'}; keeping existing process`,
      {
        details: { success, durationMs: options.durationMs, reason: options.reason },
        cycle: options.cycle,
      }
    );
  }

  logProcess(
    level: ReloadLogLevel,
    message: string,
    options: { cycle?: number; pid?: number; details?: Record<string, unknown> } = {}
  ): ReloadLogEntry {
    return this.log(level, 'PROCESS', message, {
      details: { pid: options.pid, ...options.details },
      cycle: options.cycle,
    });
  }

  logStateChange(from: string, to: string, cycle?: number): ReloadLogEntry {
    return this.log('debug', 'STATE', `${from} -> ${to}`, {
      details: { from, to },
      cycle,
    });
  }

  logError(message: string, error: unknown, options: { cycle?: number } = {}): ReloadLogEntry {
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', 'ERROR', `${message}: ${describeError(error)}`, {
      details: {
        error: describeError(error),
        stack: errorStack,
      },
      cycle: options.cycle,
    });
  }

  // Retrieval methods

  getAll(): ReloadLogEntry[] {
    return [...this.entries];
  }

  getByCategory(category: ReloadLogCategory): ReloadLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getByCycle(cycle: number): ReloadLogEntry[] {
    return this.entries.filter((e) => e.cycle === cycle);
  }

  /**
   * Get recent logs (last N entries)
   */
  getRecent(count: number = 50): ReloadLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: ReloadLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

// Singleton instance for global access
let globalLogger: ReloadLogger | null = null;

export function getReloadLogger(): ReloadLogger {
  if (!globalLogger) {
    globalLogger = new ReloadLogger();
  }
  return globalLogger;
}

export function resetReloadLogger(): void {
  globalLogger = null;
}
