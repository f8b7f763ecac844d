#!/usr/bin/env node
import { loadConfig } from './config.js';
import { ControlPlaneClient } from './control-plane-client.js';
import { ConfigurationError, ServerUnavailableError } from './errors.js';
import { parseInstancesArgs, runInstancesCommand, USAGE, VERSION } from './instances-command.js';
import { InstanceLifecycleController } from './lifecycle.js';
import { logger } from './logger.js';

async function main(): Promise<number> {
  const args = parseInstancesArgs(process.argv.slice(2));
  if (args.version) {
    console.log(VERSION);
    return 0;
  }

  const config = loadConfig();
  const authToken = args.authToken ?? config.authToken;
  if (!authToken) {
    console.error('no authToken found');
    return 1;
  }
  if (args.subcommand !== 'sc') {
    console.error('sc is the only available subcommand');
    return 1;
  }

  const client = new ControlPlaneClient({
    apiUrl: config.apiUrl,
    authToken,
    apiVersion: config.apiVersion,
    retryDelayMs: config.retryDelayMs,
  });
  const controller = new InstanceLifecycleController(client, {
    launchRecoveryDelayMs: config.launchRecoveryDelayMs,
    pollIntervalMs: config.pollIntervalMs,
    terminateConcurrency: config.terminateConcurrency,
  });

  // First ctrl-c cuts the launch wait short; a second one exits.
  const interrupt = new AbortController();
  process.once('SIGINT', () => {
    logger.info('caught SIGINT (ctrl-c), skipping ahead');
    interrupt.abort();
  });

  return runInstancesCommand(args, {
    controller,
    launchTimeoutSeconds: config.launchTimeoutSeconds,
    out: (text) => console.log(text),
    signal: interrupt.signal,
  });
}

main().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exit(2);
    }
    if (error instanceof ServerUnavailableError) {
      console.error(error.message);
      process.exit(3);
    }
    console.error('Failed:', error);
    process.exit(1);
  },
);
