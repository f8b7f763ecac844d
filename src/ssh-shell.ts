import ssh2 from 'ssh2';
import type { ClientChannel, ConnectConfig } from 'ssh2';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { SshTarget } from './types.js';

export interface OutputHandlers {
  onStdout(line: string): void;
  onStderr(line: string): void;
}

/** Remote-execution capability: run one command, stream its output, report its exit code. */
export interface RemoteShell {
  /**
   * Resolves with the remote exit code, or `null` when the channel closed
   * without reporting one. Rejects on connection or authentication errors
   * and when `signal` aborts.
   */
  exec(target: SshTarget, command: string, handlers: OutputHandlers, signal: AbortSignal): Promise<number | null>;
}

export interface SshShellOptions {
  readyTimeoutMs?: number;
}

function pumpLines(stream: Readable, onLine: (line: string) => void): { done: Promise<void>; stop(): void } {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on('line', (line) => onLine(line.trim()));
  let closed = false;
  const done = new Promise<void>((resolve) => lines.once('close', () => {
    closed = true;
    resolve();
  }));
  return {
    done,
    stop: () => {
      if (!closed) lines.close();
    },
  };
}

export class SshShell implements RemoteShell {
  private readonly readyTimeoutMs: number;

  constructor(options: SshShellOptions = {}) {
    this.readyTimeoutMs = options.readyTimeoutMs ?? 20_000;
  }

  exec(target: SshTarget, command: string, handlers: OutputHandlers, signal: AbortSignal): Promise<number | null> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }

      const conn = new ssh2.Client();
      let channel: ClientChannel | undefined;
      const pumps: Array<{ stop(): void }> = [];
      let settled = false;
      // Nothing reaches the handlers once the call has settled, late output included.
      const finish = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        for (const pump of pumps) pump.stop();
        channel?.destroy();
        conn.end();
        fn();
      };
      const unlessSettled = (onLine: (line: string) => void) => (line: string) => {
        if (!settled) onLine(line);
      };
      const onAbort = () => finish(() => reject(signal.reason));
      signal.addEventListener('abort', onAbort, { once: true });

      conn.on('error', (err) => finish(() => reject(err)));
      conn.on('ready', () => {
        conn.exec(command, (err: Error | undefined, opened: ClientChannel) => {
          if (err) {
            finish(() => reject(err));
            return;
          }
          if (settled) {
            opened.destroy();
            return;
          }
          channel = opened;
          let exitCode: number | null = null;
          opened.on('exit', (code: number | null) => {
            exitCode = typeof code === 'number' ? code : null;
          });
          const stdout = pumpLines(opened, unlessSettled(handlers.onStdout));
          const stderr = pumpLines(opened.stderr, unlessSettled(handlers.onStderr));
          pumps.push(stdout, stderr);
          const output = Promise.all([stdout.done, stderr.done]);
          opened.on('close', () => {
            output.then(() => finish(() => resolve(exitCode)), (e: unknown) => finish(() => reject(e)));
          });
        });
      });

      const config: ConnectConfig = {
        host: target.host,
        port: target.port,
        username: target.user,
        password: target.password ?? undefined,
        readyTimeout: this.readyTimeoutMs,
      };
      conn.connect(config);
    });
  }
}
