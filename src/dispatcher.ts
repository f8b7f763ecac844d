import { withTimeout } from './concurrency.js';
import { logger } from './logger.js';
import { classifyOutcome, formatSummary, summarizeOutcomes } from './outcome.js';
import type { ResultSink } from './results-log.js';
import type { RemoteShell } from './ssh-shell.js';
import type { InstanceRecord, RawTaskResult, RunSummary, SshTarget, TaskOutcome } from './types.js';

export interface DispatchTarget {
  instanceId: string;
  ssh: SshTarget;
}

/** Started instances that carry SSH connection details. */
export function extractSshTargets(records: readonly InstanceRecord[]): DispatchTarget[] {
  const targets: DispatchTarget[] = [];
  for (const record of records) {
    if (record.state === 'started' && record.ssh) {
      targets.push({ instanceId: record.instanceId, ssh: record.ssh });
    }
  }
  return targets;
}

export function wrapForLoginShell(command: string): string {
  return `/bin/bash --login -c "${command}"`;
}

const abbrev = (s: string) => s.slice(0, 16);

/**
 * Runs one command on many hosts concurrently. Every host gets its own
 * timeout; a slow or unreachable host only ever affects its own outcome.
 */
export class RemoteCommandDispatcher {
  constructor(
    private shell: RemoteShell,
    private sink: ResultSink,
  ) {}

  async runOnAll(
    instances: readonly InstanceRecord[],
    command: string,
    perTaskTimeoutSeconds?: number,
  ): Promise<RunSummary> {
    const startedAt = Date.now();
    const targets = extractSshTargets(instances);
    const program = wrapForLoginShell(command);
    const timeoutMs = perTaskTimeoutSeconds === undefined ? undefined : perTaskTimeoutSeconds * 1000;

    const settled = await Promise.allSettled(
      targets.map((target) => withTimeout(timeoutMs, (signal) => this.runOne(target, program, signal))),
    );

    const outcomes = settled.map((result, i) => {
      const raw: RawTaskResult = result.status === 'fulfilled'
        ? { kind: 'exit', code: result.value }
        : { kind: 'error', error: result.reason };
      const outcome = classifyOutcome(raw);
      logOutcome(targets[i].instanceId, outcome, raw);
      return outcome;
    });

    const summary = summarizeOutcomes(outcomes, Date.now() - startedAt);
    logger.info({ summary }, formatSummary(summary));
    return summary;
  }

  private async runOne(target: DispatchTarget, program: string, signal: AbortSignal): Promise<number | null> {
    const { instanceId, ssh } = target;
    const host = abbrev(ssh.host);
    logger.info({ instanceId, host: ssh.host, port: ssh.port, user: ssh.user }, 'connecting');

    // A timed-out host is finished as far as the results log goes.
    const code = await this.shell.exec(ssh, program, {
      onStdout: (line) => {
        if (signal.aborted) return;
        logger.info(`stdout[${host}] ${line}`);
        this.sink.record('stdout', line, instanceId);
      },
      onStderr: (line) => {
        if (signal.aborted) return;
        logger.info(`stderr[${host}] ${line}`);
        this.sink.record('stderr', line, instanceId);
      },
    }, signal);
    if (signal.aborted) return code;

    this.sink.record('returncode', code, instanceId);
    if (code === null) {
      logger.warn({ instanceId, host: ssh.host }, 'no return code from remote process');
    } else {
      logger.info({ instanceId, host: ssh.host, code }, `returncode[${host}] ${code}`);
    }
    return code;
  }
}

function logOutcome(instanceId: string, outcome: TaskOutcome, raw: RawTaskResult): void {
  const iid = abbrev(instanceId);
  switch (outcome.kind) {
    case 'success':
      logger.debug({ instanceId }, `result code 0 for ${iid}`);
      break;
    case 'nonZeroExit':
      logger.warn({ instanceId, code: outcome.code }, `result code ${outcome.code} for ${iid}`);
      break;
    case 'timeout':
      logger.warn({ instanceId }, `task timed out for ${iid}`);
      break;
    case 'connectionFailure':
      logger.warn({ instanceId, cause: outcome.cause }, `could not connect to ${iid}`);
      break;
    case 'other':
      logger.warn(
        { instanceId, cause: outcome.cause, err: raw.kind === 'error' ? raw.error : undefined },
        `task result for ${iid} was ${outcome.cause}`,
      );
      break;
  }
}
