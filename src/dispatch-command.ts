import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { RemoteCommandDispatcher } from './dispatcher.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { formatSummary } from './outcome.js';
import { EventTiming, formatTimingSummary } from './report.js';
import { ResultsLog, resultsLogPath } from './results-log.js';
import { LaunchedFileSchema } from './schemas.js';
import type { RemoteShell } from './ssh-shell.js';
import type { InstanceRecord, RunSummary } from './types.js';

export interface RunArgs {
  launchedJsonFilePath: string;
  command: string;
  timeLimit?: number;
  resultsDir: string;
}

export const RUN_USAGE = `Usage: sc-run <launched.json> [--command <cmd>] [--timeLimit <seconds>] [--resultsDir <dir>]`;

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        command: { type: 'string', default: 'uname' },
        timeLimit: { type: 'string' },
        resultsDir: { type: 'string', default: 'data' },
      },
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

export function parseRunArgs(argv: string[]): RunArgs {
  const parsed = parseRawArgs(argv);
  const [launchedJsonFilePath] = parsed.positionals;
  if (!launchedJsonFilePath) {
    throw new ConfigurationError('Missing path of the launched-instances JSON file');
  }

  const { timeLimit } = parsed.values;
  const seconds = timeLimit === undefined ? undefined : Number(timeLimit);
  if (seconds !== undefined && (!Number.isFinite(seconds) || seconds <= 0)) {
    throw new ConfigurationError(`Invalid --timeLimit "${timeLimit}"`);
  }

  return {
    launchedJsonFilePath,
    command: parsed.values.command ?? 'uname',
    timeLimit: seconds,
    resultsDir: parsed.values.resultsDir ?? 'data',
  };
}

export async function loadLaunchedFile(path: string): Promise<InstanceRecord[]> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${path} is not valid JSON`, { cause: error });
  }
  const parsed = LaunchedFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`${path} is not a list of instances: ${parsed.error.message}`);
  }
  return parsed.data;
}

export interface RunCommandDeps {
  shell: RemoteShell;
  out: (text: string) => void;
  now?: () => Date;
}

/**
 * Runs the command on every started instance in the launch file. The results
 * log is opened once for the run and closed on every exit path.
 */
export async function runDispatch(args: RunArgs, deps: RunCommandDeps): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const records = await loadLaunchedFile(args.launchedJsonFilePath);
  const started = records.filter((r) => r.state === 'started');
  logger.info({ loaded: records.length, started: started.length }, 'loaded instances');

  const log = await ResultsLog.open(resultsLogPath(args.resultsDir, 'sc-run', startedAt), now);
  logger.info({ path: log.path }, 'writing results log');
  try {
    log.record('programArgs', args, '<master>');
    const main = new EventTiming('main', now());
    const summary = await new RemoteCommandDispatcher(deps.shell, log).runOnAll(
      started,
      args.command,
      args.timeLimit,
    );
    main.finish(now());

    const elapsedSeconds = (now().getTime() - startedAt.getTime()) / 1000;
    logger.info({ elapsedSeconds }, `finished; elapsed time ${elapsedSeconds.toFixed(1)} seconds`);
    deps.out(formatSummary(summary));
    deps.out(`\n${formatTimingSummary([main])}`);
    return summary;
  } finally {
    await log.close();
  }
}
