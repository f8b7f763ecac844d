import { TimeoutError } from './errors.js';
import type { RawTaskResult, RunSummary, TaskOutcome } from './types.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
]);

// ssh2 tags errors raised below the protocol layer with these levels
const CONNECTION_ERROR_LEVELS = new Set(['client-socket', 'client-timeout']);

function errorProperty(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

function isConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = errorProperty(error, 'code');
  const level = errorProperty(error, 'level');
  if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) return true;
  if (typeof level === 'string' && CONNECTION_ERROR_LEVELS.has(level)) return true;
  // fetch wraps socket errors in a TypeError whose cause carries the code
  const cause = errorProperty(error, 'cause');
  return cause !== undefined && cause !== error && isConnectionError(cause);
}

export function classifyOutcome(raw: RawTaskResult): TaskOutcome {
  switch (raw.kind) {
    case 'exit':
      if (raw.code === null) return { kind: 'other', cause: 'no exit status' };
      return raw.code === 0 ? { kind: 'success' } : { kind: 'nonZeroExit', code: raw.code };
    case 'status':
      if (raw.statusCode >= 200 && raw.statusCode < 300) return { kind: 'success' };
      return { kind: 'other', cause: `HTTP ${raw.statusCode}` };
    case 'timeout':
      return { kind: 'timeout' };
    case 'error':
      if (raw.error instanceof TimeoutError) return { kind: 'timeout' };
      if (isConnectionError(raw.error)) {
        return { kind: 'connectionFailure', cause: describeError(raw.error) };
      }
      return { kind: 'other', cause: describeError(raw.error) };
  }
}

export function summarizeOutcomes(outcomes: readonly TaskOutcome[], elapsedMs: number): RunSummary {
  const summary: RunSummary = {
    good: 0,
    failed: 0,
    timedOut: 0,
    unreachable: 0,
    other: 0,
    total: outcomes.length,
    elapsedMs,
  };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'success':
        summary.good++;
        break;
      case 'nonZeroExit':
        summary.failed++;
        break;
      case 'timeout':
        summary.timedOut++;
        break;
      case 'connectionFailure':
        summary.unreachable++;
        break;
      case 'other':
        summary.other++;
        break;
    }
  }
  return summary;
}

export function formatSummary(summary: RunSummary): string {
  return `${summary.good} good, ${summary.failed} failed, ${summary.timedOut} timed out, `
    + `${summary.unreachable} unreachable, ${summary.other} other`;
}
