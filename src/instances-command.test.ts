import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigurationError, ServerUnavailableError } from './errors.js';
import {
  LAUNCH_EXCEPTION_EXIT_CODE,
  launchExitCode,
  parseInstancesArgs,
  runInstancesCommand,
  type InstancesCommandDeps,
  type LifecycleOperations,
} from './instances-command.js';
import type { DescribedInstance, RunSummary } from './types.js';

function summary(good: number, total: number): RunSummary {
  return { good, failed: 0, timedOut: 0, unreachable: 0, other: total - good, total, elapsedMs: 0 };
}

function createController() {
  return {
    launch: vi.fn<LifecycleOperations['launch']>(),
    awaitStarted: vi.fn<LifecycleOperations['awaitStarted']>().mockResolvedValue({
      instances: new Map(),
      interrupted: false,
      summary: summary(1, 1),
    }),
    describe: vi.fn<LifecycleOperations['describe']>().mockResolvedValue([]),
    listIds: vi.fn<LifecycleOperations['listIds']>().mockResolvedValue([]),
    terminate: vi.fn<LifecycleOperations['terminate']>(),
    terminateAll: vi.fn<LifecycleOperations['terminateAll']>(),
  };
}

const startedA: DescribedInstance = { instanceId: 'a', details: { id: 'a', state: 'started', job: 'j1' } };

describe('parseInstancesArgs', () => {
  it('parses a launch', () => {
    const args = parseInstancesArgs([
      'sc', 'launch', '--count', '3', '--region', 'usa', '--region', 'europe,asia',
      '--itype', 'arm64-v8a', '--filter', '{"ram": ">=4000"}', '--json',
    ]);

    expect(args).toMatchObject({
      subcommand: 'sc',
      action: 'launch',
      count: 3,
      regions: ['usa', 'europe', 'asia'],
      itype: 'arm64-v8a',
      filter: '{"ram": ">=4000"}',
      json: true,
      showPasswords: false,
      version: false,
    });
  });

  it('defaults count to one', () => {
    expect(parseInstancesArgs(['sc', 'launch']).count).toBe(1);
  });

  it('collects instance ids from repeated, comma-separated and trailing values', () => {
    expect(parseInstancesArgs(['sc', 'terminate', '--instanceId', 'a', 'b', 'c']).instanceIds).toEqual(['a', 'b', 'c']);
    expect(parseInstancesArgs(['sc', 'terminate', '--instanceId', 'a,b', '--instanceId', 'c']).instanceIds)
      .toEqual(['a', 'b', 'c']);
  });

  it('rejects an unknown action', () => {
    expect(() => parseInstancesArgs(['sc', 'reboot'])).toThrow(ConfigurationError);
  });

  it('accepts --version without an action', () => {
    expect(parseInstancesArgs(['--version']).version).toBe(true);
  });

  it('rejects a bad count', () => {
    expect(() => parseInstancesArgs(['sc', 'launch', '--count', '0'])).toThrow(ConfigurationError);
    expect(() => parseInstancesArgs(['sc', 'launch', '--count', 'many'])).toThrow(ConfigurationError);
    expect(() => parseInstancesArgs(['sc', 'launch', '--count', '1.5'])).toThrow(ConfigurationError);
  });

  it('rejects unknown options', () => {
    expect(() => parseInstancesArgs(['sc', 'list', '--bogus'])).toThrow(ConfigurationError);
  });
});

describe('launchExitCode', () => {
  it('maps server errors above 400 down by 400', () => {
    expect(launchExitCode(502)).toBe(102);
    expect(launchExitCode(404)).toBe(4);
    expect(launchExitCode(400)).toBe(400);
  });
});

describe('runInstancesCommand', () => {
  let controller: ReturnType<typeof createController>;
  let output: string[];
  let deps: InstancesCommandDeps;

  beforeEach(() => {
    controller = createController();
    output = [];
    deps = { controller, launchTimeoutSeconds: 600, out: (text) => output.push(text) };
  });

  describe('launch', () => {
    it('waits for the instances and prints the report', async () => {
      controller.launch.mockResolvedValue({ ok: true, jobId: 'j1', instances: [{ id: 'a' }] });
      controller.describe.mockResolvedValue([startedA]);

      const code = await runInstancesCommand(parseInstancesArgs(['sc', 'launch', '--itype', 'arm64-v8a']), deps);

      expect(code).toBe(0);
      expect(controller.launch).toHaveBeenCalledWith({
        count: 1,
        regions: [],
        abis: ['arm64-v8a'],
        sshKeyName: undefined,
        filter: undefined,
      });
      expect(controller.awaitStarted).toHaveBeenCalledWith(['a'], 600, { signal: undefined });
      expect(output).toEqual(['a,started,j1']);
    });

    it('exits with the reduced server error', async () => {
      controller.launch.mockResolvedValue({ ok: false, jobId: 'j1', serverError: 502 });

      const code = await runInstancesCommand(parseInstancesArgs(['sc', 'launch']), deps);

      expect(code).toBe(102);
      expect(controller.awaitStarted).not.toHaveBeenCalled();
      expect(output).toEqual([]);
    });

    it('exits with the launch exception code on unexpected errors', async () => {
      controller.launch.mockRejectedValue(new Error('socket hang up'));

      const code = await runInstancesCommand(parseInstancesArgs(['sc', 'launch']), deps);

      expect(code).toBe(LAUNCH_EXCEPTION_EXIT_CODE);
    });

    it('lets configuration and availability errors through', async () => {
      controller.launch.mockRejectedValueOnce(new ConfigurationError('bad filter'));
      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'launch']), deps)).rejects.toThrow(ConfigurationError);

      controller.launch.mockRejectedValueOnce(new ServerUnavailableError('no versions'));
      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'launch']), deps))
        .rejects.toThrow(ServerUnavailableError);
    });
  });

  describe('list', () => {
    it('lists every allocated instance by default', async () => {
      controller.listIds.mockResolvedValue(['a']);
      controller.describe.mockResolvedValue([startedA]);

      const code = await runInstancesCommand(parseInstancesArgs(['sc', 'list']), deps);

      expect(code).toBe(0);
      expect(controller.describe).toHaveBeenCalledWith(['a']);
      expect(output).toEqual(['a,started,0,None,*,j1']);
    });

    it('treats ALL like no ids', async () => {
      await runInstancesCommand(parseInstancesArgs(['sc', 'list', '--instanceId', 'ALL']), deps);

      expect(controller.listIds).toHaveBeenCalledTimes(1);
    });

    it('describes only the given ids', async () => {
      await runInstancesCommand(parseInstancesArgs(['sc', 'list', '--instanceId', 'x,y']), deps);

      expect(controller.listIds).not.toHaveBeenCalled();
      expect(controller.describe).toHaveBeenCalledWith(['x', 'y']);
      expect(output).toEqual([]);
    });

    it('fails when the list cannot be fetched', async () => {
      controller.listIds.mockRejectedValue(new Error('fetch failed'));

      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'list']), deps)).resolves.toBe(1);
    });
  });

  describe('terminate', () => {
    it('terminates the given ids', async () => {
      controller.terminate.mockResolvedValue(summary(2, 2));

      const code = await runInstancesCommand(parseInstancesArgs(['sc', 'terminate', '--instanceId', 'a', 'b']), deps);

      expect(code).toBe(0);
      expect(controller.terminate).toHaveBeenCalledWith(['a', 'b']);
    });

    it('terminates everything for ALL', async () => {
      controller.terminateAll.mockResolvedValue(summary(3, 3));

      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'terminate', '--instanceId', 'ALL']), deps))
        .resolves.toBe(0);
      expect(controller.terminate).not.toHaveBeenCalled();
    });

    it('fails without ids', async () => {
      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'terminate']), deps)).resolves.toBe(1);
      expect(controller.terminate).not.toHaveBeenCalled();
    });

    it('fails when any delete fails', async () => {
      controller.terminate.mockResolvedValue(summary(1, 2));

      await expect(runInstancesCommand(parseInstancesArgs(['sc', 'terminate', 'a', 'b']), deps)).resolves.toBe(1);
    });
  });
});
