import { createWriteStream, type WriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { logger } from './logger.js';

export interface ResultSink {
  record(key: string, value: unknown, instanceId: string): void;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `<dir>/<name>_results_<YYYY-MM-DD_HHMMSS>.log`, tagged in UTC. */
export function resultsLogPath(dir: string, name: string, startedAt: Date): string {
  const tag = `${startedAt.getUTCFullYear()}-${pad(startedAt.getUTCMonth() + 1)}-${pad(startedAt.getUTCDate())}`
    + `_${pad(startedAt.getUTCHours())}${pad(startedAt.getUTCMinutes())}${pad(startedAt.getUTCSeconds())}`;
  return join(dir, `${basename(name)}_results_${tag}.log`);
}

/**
 * Append-only JSON-lines sink shared by concurrent per-host tasks.
 *
 * Each record is serialized to a complete line before it is handed to the
 * single underlying stream, and the stream writes chunks in call order, so
 * lines from different tasks never interleave.
 */
export class ResultsLog implements ResultSink {
  private closed = false;

  private constructor(
    private stream: WriteStream,
    private now: () => Date,
  ) {
    stream.on('error', (err) => logger.error({ err, path: this.path }, 'results log write failed'));
  }

  static async open(path: string, now: () => Date = () => new Date()): Promise<ResultsLog> {
    await mkdir(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf8' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve());
      stream.once('error', reject);
    });
    return new ResultsLog(stream, now);
  }

  get path(): string {
    return String(this.stream.path);
  }

  record(key: string, value: unknown, instanceId: string): void {
    if (this.closed) {
      throw new Error('Results log is closed');
    }
    const line = JSON.stringify({ [key]: value, instanceId, dateTime: this.now().toISOString() });
    this.stream.write(`${line}\n`);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await new Promise<void>((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}
