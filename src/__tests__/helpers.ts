import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino, { Logger } from 'pino';

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino logger that records JSON entries in memory instead of writing them */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'checklist-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Output sink for the shell */
export class OutputCollector {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}
