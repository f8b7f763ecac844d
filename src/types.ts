export type InstanceState = 'initial' | 'starting' | 'started' | 'failed' | 'terminated';
export type TerminalState = 'started' | 'failed' | 'terminated';
export type PollStatus = TerminalState | 'starting' | 'unknown';

export interface SshTarget {
  host: string;
  port: number;
  user: string;
  password?: string | null;
}

export interface InstanceDescriptor {
  id: string;
  state: InstanceState;
  job: string;
  ssh?: SshTarget;
  // device info, progress, failure, app-version, ...
  [extra: string]: unknown;
}

/** Entry of the control plane's instance list; carries at least an id. */
export interface ListedInstance {
  id: string;
  [extra: string]: unknown;
}

/** An instance as written to (and read back from) a launch/list JSON report. */
export interface InstanceRecord {
  instanceId: string;
  state: string;
  ssh?: SshTarget;
  [extra: string]: unknown;
}

export interface LaunchRequest {
  readonly count: number;
  readonly regions: readonly string[];
  readonly abis: readonly string[];
  readonly sshKeyName?: string;
  readonly jobId: string;
  readonly extraFilter?: Readonly<Record<string, unknown>>;
}

export interface LaunchOptions {
  count: number;
  regions?: string[];
  abis?: string[];
  sshKeyName?: string;
  filter?: string;
}

export type LaunchResult =
  | { ok: true; jobId: string; instances: ListedInstance[] }
  | { ok: false; jobId: string; serverError: number };

export interface ApiResponse {
  content: unknown;
  statusCode: number;
}

export type TaskOutcome =
  | { kind: 'success' }
  | { kind: 'nonZeroExit'; code: number }
  | { kind: 'timeout' }
  | { kind: 'connectionFailure'; cause: string }
  | { kind: 'other'; cause: string };

export type RawTaskResult =
  | { kind: 'exit'; code: number | null }
  | { kind: 'status'; statusCode: number }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export interface RunSummary {
  good: number;
  failed: number;
  timedOut: number;
  unreachable: number;
  other: number;
  total: number;
  elapsedMs: number;
}

export interface PollRecord {
  id: string;
  status: PollStatus;
  descriptor?: InstanceDescriptor;
}

export interface AwaitStartedResult {
  instances: Map<string, PollRecord>;
  interrupted: boolean;
  summary: RunSummary;
}

/** Instance details as reported; `state` may be one this tool does not poll for. */
export interface InstanceDetails {
  id: string;
  state: string;
  job: string;
  ssh?: SshTarget;
  [extra: string]: unknown;
}

export interface DescribedInstance {
  instanceId: string;
  details: InstanceDetails;
}
