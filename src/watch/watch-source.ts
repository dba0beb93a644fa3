/**
 * Watch Source
 *
 * chokidar watcher over the configured paths. Raw notifications pass through
 * the path filter; relevant ones are forwarded as change events. A watcher
 * error is fatal for the session.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { FSWatcher, watch } from 'chokidar';
import { ErrorCode } from '../errors/error-codes';
import { ReforgeError, describeError } from '../errors/reforge-error';
import type { ReloadLogger } from '../logging/reload-logger';
import type { ChangeEvent } from '../core/debouncer';
import type { PathFilter } from './path-filter';

const FILE_EVENTS = new Set(['add', 'change', 'unlink']);

/**
 * What the session needs from a watch source
 */
export interface IWatchSource {
  start(): Promise<void>;
  close(): Promise<void>;
  onChange(listener: (event: ChangeEvent) => void): void;
  onError(listener: (error: ReforgeError) => void): void;
}

export interface ChokidarWatchSourceOptions {
  root: string;
  paths: readonly string[];
  filter: PathFilter;
  logger?: ReloadLogger;
}

export class ChokidarWatchSource extends EventEmitter implements IWatchSource {
  private readonly root: string;
  private readonly paths: readonly string[];
  private readonly filter: PathFilter;
  private readonly logger?: ReloadLogger;
  private watcher: FSWatcher | null = null;

  constructor(options: ChokidarWatchSourceOptions) {
    super();
    this.root = options.root;
    this.paths = options.paths;
    this.filter = options.filter;
    this.logger = options.logger;
  }

  /**
   * Watch paths that exist; missing ones are skipped with a notice.
   */
  existingPaths(): string[] {
    const existing: string[] = [];
    for (const p of this.paths) {
      if (fs.existsSync(path.resolve(this.root, p))) {
        existing.push(p);
      } else {
        this.logger?.logWatch(`watch path missing (skipped): ${p}`);
      }
    }
    return existing;
  }

  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }
    const paths = this.existingPaths();
    if (paths.length === 0) {
      throw new ReforgeError(ErrorCode.E402_NO_WATCH_PATHS, this.paths.join(', '));
    }

    const watcher = watch(paths, {
      cwd: this.root,
      ignoreInitial: true,
      persistent: true,
      ignored: (candidate: string) => this.filter.isIgnored(candidate),
    });
    this.watcher = watcher;

    watcher.on('all', (eventName, filePath) => {
      if (!FILE_EVENTS.has(eventName) || !this.filter.accepts(filePath)) {
        return;
      }
      this.emit('change', { path: filePath, timestamp: Date.now() });
    });

    watcher.on('error', (error) => {
      this.emit('error', new ReforgeError(ErrorCode.E401_WATCH_SOURCE_FAILED, describeError(error)));
    });

    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));
    this.logger?.logWatch(`watching ${paths.join(', ')}`, { paths });
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }

  onChange(listener: (event: ChangeEvent) => void): void {
    this.on('change', listener);
  }

  onError(listener: (error: ReforgeError) => void): void {
    this.on('error', listener);
  }
}
