import { pino } from 'pino';
import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';

export interface LogEntry {
  readonly level: number;
  readonly component?: string;
  readonly msg?: string;
  readonly [key: string]: unknown;
}

/**
 * Logger factory for tests: a real pino logger writing JSON lines into
 * memory, so assertions read what would have gone to stderr.
 */
export class FakeLoggerFactory implements ILoggerFactory {
  readonly entries: LogEntry[] = [];
  readonly root: Logger;

  constructor() {
    this.root = pino(
      { level: 'trace', base: undefined, timestamp: false },
      { write: (line: string) => this.entries.push(parseEntry(line)) }
    );
  }

  create(component: string): Logger {
    return this.root.child({ component });
  }

  // Test helpers

  messages(component?: string): string[] {
    return this.entries
      .filter((entry) => component === undefined || entry.component === component)
      .map((entry) => entry.msg ?? '');
  }

  has(levelName: 'debug' | 'info' | 'warn' | 'error', msg: string): boolean {
    const level = pino.levels.values[levelName];
    return this.entries.some((entry) => entry.level === level && entry.msg === msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

function parseEntry(line: string): LogEntry {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== 'object' || parsed === null || !('level' in parsed) || typeof parsed.level !== 'number') {
    throw new Error(`Unexpected log line: ${line}`);
  }
  const record: Record<string, unknown> = { ...parsed };
  return {
    ...record,
    level: parsed.level,
    component: typeof record['component'] === 'string' ? record['component'] : undefined,
    msg: typeof record['msg'] === 'string' ? record['msg'] : undefined,
  };
}
