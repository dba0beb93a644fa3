/**
 * Console sink: prints log entries as timestamped status lines on stderr.
 */

import { LOG_LEVEL_ORDER, ReloadLogEntry, ReloadLogLevel, ReloadLogSubscriber } from './reload-logger';

/** ANSI: clear screen, cursor home */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface ConsoleSinkOptions {
  level?: ReloadLogLevel;
  /** Defaults to process.stderr */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Local wall-clock timestamp, e.g. 2024-03-05 09:07:01
 */
export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function formatLine(entry: ReloadLogEntry, when: Date): string {
  return `[${formatTimestamp(when)}] reforge: ${entry.message}`;
}

export class ConsoleSink implements ReloadLogSubscriber {
  private readonly level: ReloadLogLevel;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: ConsoleSinkOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? ((line) => process.stderr.write(line));
    this.now = options.now ?? (() => new Date());
  }

  onLog(entry: ReloadLogEntry): void {
    if (LOG_LEVEL_ORDER[entry.level] < LOG_LEVEL_ORDER[this.level]) {
      return;
    }
    this.write(formatLine(entry, this.now()) + '\n');
  }
}

/**
 * Clear the terminal before a fresh run process takes over the screen.
 * No-op when stdout is not a terminal.
 */
export function clearScreen(stream: { isTTY?: boolean; write(chunk: string): boolean } = process.stdout): boolean {
  if (!stream.isTTY) {
    return false;
  }
  stream.write(CLEAR_SCREEN);
  return true;
}
