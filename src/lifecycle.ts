import { randomUUID } from 'crypto';
import { mapWithConcurrency, sleep } from './concurrency.js';
import type { ControlPlaneApi } from './control-plane-client.js';
import { ConfigurationError, ServerUnavailableError } from './errors.js';
import { logger } from './logger.js';
import { classifyOutcome, formatSummary, summarizeOutcomes } from './outcome.js';
import {
  InstanceDescriptorSchema,
  InstanceDetailsSchema,
  InstanceListSchema,
  LaunchFilterSchema,
  LaunchResponseSchema,
} from './schemas.js';
import type {
  ApiResponse,
  AwaitStartedResult,
  DescribedInstance,
  InstanceDescriptor,
  InstanceDetails,
  InstanceState,
  LaunchOptions,
  LaunchRequest,
  LaunchResult,
  PollRecord,
  PollStatus,
  RunSummary,
  TaskOutcome,
} from './types.js';

const LAUNCH_RECOVERY_RETRIES = 20;

export interface LifecycleOptions {
  launchRecoveryDelayMs?: number;
  pollIntervalMs?: number;
  terminateConcurrency?: number;
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function isTerminal(status: PollStatus): boolean {
  return status === 'started' || status === 'failed' || status === 'terminated';
}

function pollStatusOf(state: InstanceState): PollStatus {
  return state === 'initial' || state === 'starting' ? 'starting' : state;
}

/**
 * Parses a caller-supplied JSON launch filter. `null` means no filter;
 * anything that is not a JSON object is a configuration error.
 */
export function parseLaunchFilter(filter: string | undefined): Record<string, unknown> | undefined {
  if (!filter) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(filter);
  } catch (error) {
    logger.error({ filter }, 'invalid json in filter');
    throw new ConfigurationError(`Invalid JSON in filter "${filter}"`, { cause: error });
  }
  if (parsed === null) return undefined;

  const result = LaunchFilterSchema.safeParse(parsed);
  if (!result.success) {
    logger.error({ filter }, 'json in filter is not an object');
    throw new ConfigurationError(`JSON in filter is not an object: "${filter}"`);
  }
  return Object.keys(result.data).length > 0 ? result.data : undefined;
}

export function buildLaunchRequest(options: LaunchOptions, jobId: string = randomUUID()): LaunchRequest {
  return Object.freeze({
    count: options.count,
    regions: Object.freeze([...(options.regions ?? [])]),
    abis: Object.freeze([...(options.abis ?? [])]),
    sshKeyName: options.sshKeyName,
    jobId,
    extraFilter: parseLaunchFilter(options.filter),
  });
}

export function launchRequestBody(request: LaunchRequest): Record<string, unknown> {
  return {
    abis: request.abis,
    job: request.jobId,
    regions: request.regions,
    ssh_key: request.sshKeyName ?? null,
    count: request.count,
    ...request.extraFilter,
  };
}

/**
 * Owns the launch → poll → report → terminate lifecycle for a batch of
 * instances. The id → record map built while polling is written only from
 * the polling loop.
 */
export class InstanceLifecycleController {
  private readonly launchRecoveryDelayMs: number;
  private readonly pollIntervalMs: number;
  private readonly terminateConcurrency: number;

  constructor(
    private api: ControlPlaneApi,
    options: LifecycleOptions = {},
  ) {
    this.launchRecoveryDelayMs = options.launchRecoveryDelayMs ?? 30_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.terminateConcurrency = options.terminateConcurrency ?? 2;
  }

  async launch(options: LaunchOptions): Promise<LaunchResult> {
    const appVersions = await this.api.getAppVersions();
    if (appVersions.length === 0) {
      logger.error('could not get app versions from server');
      throw new ServerUnavailableError('No application versions available from the control plane');
    }

    const request = buildLaunchRequest(options);
    const body = launchRequestBody(request);
    logger.info({ request: body }, 'launch request');

    const response = await this.api.createInstances(body);
    logger.info({ statusCode: response.statusCode, jobId: request.jobId }, 'launch response');
    if (isSuccess(response.statusCode)) {
      const parsed = LaunchResponseSchema.safeParse(response.content);
      if (parsed.success) {
        return { ok: true, jobId: request.jobId, instances: parsed.data };
      }
      logger.warn({ content: response.content }, 'unexpected launch response body');
    }

    return this.recoverLaunch(request.jobId, response.statusCode);
  }

  /**
   * The launch may have partially succeeded server-side; look the batch up
   * by its job id. Falls back to the original status when that lookup
   * throws or finds nothing.
   */
  private async recoverLaunch(jobId: string, originalStatus: number): Promise<LaunchResult> {
    logger.info({ jobId, delayMs: this.launchRecoveryDelayMs }, 'attempting recovery from launch error');
    await sleep(this.launchRecoveryDelayMs);

    let recovered: ApiResponse;
    try {
      recovered = await this.api.listInstances({ job: jobId }, LAUNCH_RECOVERY_RETRIES);
    } catch (error) {
      logger.error({ err: error, jobId }, 'exception getting list of instances');
      return { ok: false, jobId, serverError: originalStatus };
    }

    if (!isSuccess(recovered.statusCode)) {
      logger.info({ statusCode: recovered.statusCode }, 'returning server error');
      return { ok: false, jobId, serverError: recovered.statusCode };
    }

    const list = InstanceListSchema.safeParse(recovered.content);
    if (!list.success || list.data.my.length === 0) {
      logger.warn({ jobId }, 'no instances found for job; returning original error');
      return { ok: false, jobId, serverError: originalStatus };
    }

    logger.info({ jobId, count: list.data.my.length }, 'recovered instances for job');
    return { ok: true, jobId, instances: list.data.my };
  }

  async awaitStarted(
    instanceIds: readonly string[],
    timeoutSeconds: number,
    options: { signal?: AbortSignal } = {},
  ): Promise<AwaitStartedResult> {
    const { signal } = options;
    const startedAt = Date.now();
    const deadline = startedAt + timeoutSeconds * 1000;

    const records = new Map<string, PollRecord>();
    for (const id of instanceIds) {
      if (!records.has(id)) records.set(id, { id, status: 'unknown' });
    }

    let interrupted = false;
    for (;;) {
      const states: Record<string, number> = {};
      for (const record of records.values()) {
        if (signal?.aborted) break;
        if (isTerminal(record.status)) continue;

        const descriptor = await this.pollInstance(record.id, signal);
        if (!descriptor) continue;

        states[descriptor.state] = (states[descriptor.state] ?? 0) + 1;
        record.descriptor = descriptor;
        record.status = pollStatusOf(descriptor.state);
        if (descriptor.state === 'initial') {
          logger.info({ instanceId: record.id }, 'instance still initial');
        }
      }

      const counts = countByStatus(records);
      logger.info({ started: counts.started, states }, 'instance(s) launched so far');

      if (signal?.aborted) {
        interrupted = true;
        logger.info('interrupted, skipping ahead');
        break;
      }
      if (counts.pending === 0) break;
      if (Date.now() > deadline) {
        logger.warn({ pending: counts.pending }, 'took too long for some instances to start');
        break;
      }
      await sleep(this.pollIntervalMs, signal);
    }

    const outcomes = [...records.values()].map(outcomeOfPoll);
    const summary = summarizeOutcomes(outcomes, Date.now() - startedAt);
    logger.info({ summary }, `started ${summary.good} instance(s)`);
    return { instances: records, interrupted, summary };
  }

  private async pollInstance(instanceId: string, signal?: AbortSignal): Promise<InstanceDescriptor | undefined> {
    let response: ApiResponse;
    try {
      response = await this.api.getInstance(instanceId, signal);
    } catch (error) {
      if (signal?.aborted) {
        logger.debug({ instanceId }, 'state query cancelled');
      } else {
        logger.warn({ err: error, instanceId }, 'exception checking instance state');
      }
      return undefined;
    }

    const parsed = InstanceDescriptorSchema.safeParse(response.content);
    if (!parsed.success) {
      logger.warn(
        { instanceId, statusCode: response.statusCode, content: response.content },
        'no valid "state" in content of response',
      );
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Fetches details for reporting. Descriptors already known as started are
   * reused; ids that cannot be queried are skipped with a warning.
   */
  async describe(
    instanceIds: readonly string[],
    known?: ReadonlyMap<string, PollRecord>,
  ): Promise<DescribedInstance[]> {
    const described: DescribedInstance[] = [];
    for (const instanceId of instanceIds) {
      const record = known?.get(instanceId);
      let details: InstanceDetails | undefined = record?.status === 'started' ? record.descriptor : undefined;

      if (!details) {
        let response: ApiResponse;
        try {
          response = await this.api.getInstance(instanceId);
        } catch (error) {
          logger.error({ err: error, instanceId }, 'exception getting instance details');
          continue;
        }
        if (!isSuccess(response.statusCode)) {
          logger.warn({ instanceId, statusCode: response.statusCode }, 'instance not found');
          continue;
        }
        const parsed = InstanceDetailsSchema.safeParse(response.content);
        if (!parsed.success) {
          logger.warn({ instanceId, content: response.content }, 'unexpected instance details');
          continue;
        }
        details = parsed.data;
      }

      warnAboutDetails(instanceId, details);
      described.push({ instanceId, details });
    }
    return described;
  }

  /** Ids of the instances currently allocated to the caller. */
  async listIds(): Promise<string[]> {
    const response = await this.api.listInstances();
    if (!isSuccess(response.statusCode)) {
      logger.warn({ statusCode: response.statusCode }, 'could not list instances');
      return [];
    }
    const list = InstanceListSchema.safeParse(response.content);
    if (!list.success) {
      logger.warn({ content: response.content }, 'unexpected instance list');
      return [];
    }
    logger.info({ count: list.data.my.length }, 'found allocated instances');
    return list.data.my.map((inst) => inst.id);
  }

  /**
   * Deletes every id exactly once through a small worker pool. A failed
   * delete is logged and counted; it never stops the others.
   */
  async terminate(instanceIds: readonly string[]): Promise<RunSummary> {
    const startedAt = Date.now();
    const settled = await mapWithConcurrency(instanceIds, this.terminateConcurrency, (instanceId) => {
      logger.info({ instanceId }, 'terminating');
      return this.api.deleteInstance(instanceId);
    });

    const outcomes = settled.map((result, i) => {
      const outcome = classifyOutcome(
        result.status === 'fulfilled'
          ? { kind: 'status', statusCode: result.value }
          : { kind: 'error', error: result.reason },
      );
      if (outcome.kind !== 'success') {
        logger.warn({ instanceId: instanceIds[i], outcome }, 'termination failed');
      }
      return outcome;
    });

    const summary = summarizeOutcomes(outcomes, Date.now() - startedAt);
    logger.info({ summary }, `terminated: ${formatSummary(summary)}`);
    return summary;
  }

  async terminateAll(): Promise<RunSummary> {
    return this.terminate(await this.listIds());
  }
}

function countByStatus(records: ReadonlyMap<string, PollRecord>): { started: number; pending: number } {
  let started = 0;
  let pending = 0;
  for (const record of records.values()) {
    if (record.status === 'started') started++;
    if (!isTerminal(record.status)) pending++;
  }
  return { started, pending };
}

function outcomeOfPoll(record: PollRecord): TaskOutcome {
  switch (record.status) {
    case 'started':
      return { kind: 'success' };
    case 'failed':
    case 'terminated':
      return { kind: 'other', cause: record.status };
    case 'starting':
    case 'unknown':
      return { kind: 'timeout' };
  }
}

function warnAboutDetails(instanceId: string, details: InstanceDetails): void {
  const appVersion = details['app-version'];
  if (typeof appVersion === 'object' && appVersion !== null && 'code' in appVersion) {
    logger.info({ instanceId, version: appVersion.code }, 'instance app version');
  }
  if (details.failure !== undefined) {
    logger.warn({ instanceId, failure: details.failure }, 'instance failure');
  }
  const progress = details.progress;
  if (progress !== undefined) {
    const launched = typeof progress === 'string' && progress.includes('SC instance launched');
    if (details.state !== 'started' || !launched) {
      logger.warn({ instanceId, progress }, 'instance progress');
    }
  }
}
