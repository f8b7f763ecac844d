#!/usr/bin/env node
import { loadConfig } from './config.js';
import { parseRunArgs, runDispatch, RUN_USAGE } from './dispatch-command.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { SshShell } from './ssh-shell.js';

async function main(): Promise<number> {
  const args = parseRunArgs(process.argv.slice(2));
  const config = loadConfig();
  logger.info({ args }, 'args');

  const summary = await runDispatch(args, {
    shell: new SshShell({ readyTimeoutMs: config.sshReadyTimeoutMs }),
    out: (text) => console.log(text),
  });
  return summary.good === summary.total ? 0 : 1;
}

main().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}\n\n${RUN_USAGE}`);
      process.exit(2);
    }
    console.error('Failed:', error);
    process.exit(1);
  },
);
