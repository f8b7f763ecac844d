import { z } from 'zod';

const ConfigSchema = z.object({
  apiUrl: z.string().url().default('https://cloud.neocortix.com/cloud-api/sc'),
  authToken: z.string().optional(),
  apiVersion: z.string().min(1).default('1'),
  retryDelayMs: z.number().int().min(0).default(10_000),
  launchRecoveryDelayMs: z.number().int().min(0).default(30_000),
  pollIntervalMs: z.number().int().min(0).default(5_000),
  launchTimeoutSeconds: z.number().min(1).default(600),
  terminateConcurrency: z.number().int().min(1).max(16).default(2),
  sshReadyTimeoutMs: z.number().int().min(1000).default(20_000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

function intFromEnv(name: string, fallback: string): number {
  return parseInt(process.env[name] || fallback, 10);
}

export function loadConfig(): Config {
  return ConfigSchema.parse({
    apiUrl: process.env.SC_API_URL || 'https://cloud.neocortix.com/cloud-api/sc',
    authToken: process.env.SC_AUTH_TOKEN || undefined,
    apiVersion: process.env.SC_API_VERSION || '1',
    retryDelayMs: intFromEnv('SC_RETRY_DELAY_MS', '10000'),
    launchRecoveryDelayMs: intFromEnv('SC_LAUNCH_RECOVERY_DELAY_MS', '30000'),
    pollIntervalMs: intFromEnv('SC_POLL_INTERVAL_MS', '5000'),
    launchTimeoutSeconds: intFromEnv('SC_LAUNCH_TIMEOUT_SECONDS', '600'),
    terminateConcurrency: intFromEnv('SC_TERMINATE_CONCURRENCY', '2'),
    sshReadyTimeoutMs: intFromEnv('SC_SSH_READY_TIMEOUT_MS', '20000'),
    logLevel: process.env.LOG_LEVEL || 'info',
  });
}
