import { parseArgs } from 'util';
import { ConfigurationError, ServerUnavailableError } from './errors.js';
import type { InstanceLifecycleController } from './lifecycle.js';
import { logger } from './logger.js';
import { formatLaunchReport, formatListReport } from './report.js';
import type { LaunchResult, RunSummary } from './types.js';

export const VERSION = '0.1.0';

/** Exit code for an unexpected exception while launching. */
export const LAUNCH_EXCEPTION_EXIT_CODE = 13;

export const ACTIONS = ['launch', 'list', 'terminate'] as const;
export type Action = (typeof ACTIONS)[number];

export interface InstancesArgs {
  subcommand: string;
  action: Action;
  count: number;
  instanceIds: string[];
  filter?: string;
  json: boolean;
  regions: string[];
  showPasswords: boolean;
  sshClientKeyName?: string;
  itype?: string;
  authToken?: string;
  version: boolean;
}

export const USAGE = `Usage: sc-instances sc <launch|list|terminate> [options]

Options:
  --count <n>                 number of instances to launch (default 1)
  --instanceId <id...>        one or more instance ids, or ALL
  --filter <json>             JSON object merged into the launch request
  --json                      JSON output
  --region <name...>          geographic region(s) to target
  --showPasswords             show ssh passwords in list output
  --sshClientKeyName <name>   uploaded ssh client key to install
  --itype <abi>               instance type to create
  --authToken <token>         auth token (default: $SC_AUTH_TOKEN)
  --version                   print the version`;

function splitList(values: readonly string[] | undefined): string[] {
  return (values ?? []).flatMap((v) => v.split(',')).map((v) => v.trim()).filter((v) => v.length > 0);
}

function isAction(value: string): value is Action {
  return ACTIONS.some((a) => a === value);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        count: { type: 'string' },
        instanceId: { type: 'string', multiple: true },
        filter: { type: 'string' },
        json: { type: 'boolean', default: false },
        region: { type: 'string', multiple: true },
        showPasswords: { type: 'boolean', default: false },
        sshClientKeyName: { type: 'string' },
        itype: { type: 'string' },
        authToken: { type: 'string' },
        version: { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

/**
 * Parses `sc <action> [options]`. Values following `--instanceId` or
 * `--region` that are not themselves options are taken as further ids.
 */
export function parseInstancesArgs(argv: string[]): InstancesArgs {
  const { values, positionals } = parseRawArgs(argv);
  const [subcommand = '', action = '', ...rest] = positionals;
  const version = values.version ?? false;

  if (!version && !isAction(action)) {
    throw new ConfigurationError(`Unrecognized action "${action}"; expected one of ${ACTIONS.join(', ')}`);
  }

  const count = values.count === undefined ? 1 : Number(values.count);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigurationError(`Invalid --count "${values.count}"`);
  }

  return {
    subcommand,
    action: isAction(action) ? action : 'list',
    count,
    instanceIds: [...splitList(values.instanceId), ...splitList(rest)],
    filter: values.filter,
    json: values.json ?? false,
    regions: splitList(values.region),
    showPasswords: values.showPasswords ?? false,
    sshClientKeyName: values.sshClientKeyName,
    itype: values.itype,
    authToken: values.authToken,
    version,
  };
}

/** Server HTTP errors above 400 map onto a smaller exit-code space. */
export function launchExitCode(serverError: number): number {
  return serverError > 400 ? serverError - 400 : serverError;
}

export type LifecycleOperations = Pick<
  InstanceLifecycleController,
  'launch' | 'awaitStarted' | 'describe' | 'listIds' | 'terminate' | 'terminateAll'
>;

export interface InstancesCommandDeps {
  controller: LifecycleOperations;
  launchTimeoutSeconds: number;
  out: (text: string) => void;
  signal?: AbortSignal;
}

function isAll(instanceIds: readonly string[]): boolean {
  return instanceIds.length === 1 && instanceIds[0] === 'ALL';
}

function print(deps: InstancesCommandDeps, text: string): void {
  if (text.length > 0) deps.out(text);
}

export async function runLaunch(args: InstancesArgs, deps: InstancesCommandDeps): Promise<number> {
  const { controller } = deps;
  if (args.itype) {
    logger.info({ itype: args.itype }, 'requested instance type (might work)');
  }

  let result: LaunchResult;
  try {
    result = await controller.launch({
      count: args.count,
      regions: args.regions,
      abis: args.itype ? [args.itype] : [],
      sshKeyName: args.sshClientKeyName,
      filter: args.filter,
    });
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof ServerUnavailableError) throw error;
    logger.error({ err: error }, 'exception launching instances');
    return LAUNCH_EXCEPTION_EXIT_CODE;
  }

  if (!result.ok) {
    logger.warn({ serverError: result.serverError, jobId: result.jobId }, 'got server error');
    return launchExitCode(result.serverError);
  }

  const instanceIds = result.instances.map((inst) => inst.id);
  logger.info({ count: instanceIds.length, jobId: result.jobId }, 'allocated instances');

  const waited = await controller.awaitStarted(instanceIds, deps.launchTimeoutSeconds, { signal: deps.signal });
  logger.info('querying for device info');
  const described = await controller.describe(instanceIds, waited.instances);
  print(deps, formatLaunchReport(described, { json: args.json }));
  logger.info('finished');
  return 0;
}

export async function runList(args: InstancesArgs, deps: InstancesCommandDeps): Promise<number> {
  let instanceIds = args.instanceIds;
  if (instanceIds.length === 0 || isAll(instanceIds)) {
    try {
      instanceIds = await deps.controller.listIds();
    } catch (error) {
      logger.error({ err: error }, 'exception getting list of instances');
      return 1;
    }
  }

  const described = await deps.controller.describe(instanceIds);
  print(deps, formatListReport(described, { json: args.json, showPasswords: args.showPasswords }));
  return 0;
}

export async function runTerminate(args: InstancesArgs, deps: InstancesCommandDeps): Promise<number> {
  const startedAt = Date.now();
  let summary: RunSummary;
  try {
    if (isAll(args.instanceIds)) {
      summary = await deps.controller.terminateAll();
    } else if (args.instanceIds.length === 0) {
      logger.error('no instance ID provided for terminate');
      return 1;
    } else {
      summary = await deps.controller.terminate(args.instanceIds);
    }
  } catch (error) {
    logger.error({ err: error }, 'exception getting list of instances');
    return 1;
  }
  logger.info({ seconds: ((Date.now() - startedAt) / 1000).toFixed(1) }, 'termination took');
  return summary.good === summary.total ? 0 : 1;
}

export function runInstancesCommand(args: InstancesArgs, deps: InstancesCommandDeps): Promise<number> {
  switch (args.action) {
    case 'launch':
      return runLaunch(args, deps);
    case 'list':
      return runList(args, deps);
    case 'terminate':
      return runTerminate(args, deps);
  }
}
