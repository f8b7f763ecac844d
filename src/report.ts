import type { DescribedInstance } from './types.js';

export interface ReportOptions {
  json: boolean;
  showPasswords?: boolean;
}

function toRecord(inst: DescribedInstance, showPasswords: boolean): Record<string, unknown> {
  const record: Record<string, unknown> = { ...inst.details, instanceId: inst.instanceId };
  if (!showPasswords && inst.details.ssh) {
    record.ssh = { ...inst.details.ssh, password: '*' };
  }
  return record;
}

/** JSON array, one element per line. */
function jsonReport(records: Record<string, unknown>[]): string {
  if (records.length === 0) return '[\n]';
  return `[\n${records.map((r) => JSON.stringify(r)).join(',\n')}\n]`;
}

/**
 * Launch report: `id,state,job` lines, or the full details as JSON. Passwords
 * are kept, since the JSON is the input of the command fan-out.
 */
export function formatLaunchReport(instances: readonly DescribedInstance[], options: ReportOptions): string {
  if (options.json) {
    return jsonReport(instances.map((inst) => toRecord(inst, true)));
  }
  return instances.map((inst) => `${inst.instanceId},${inst.details.state},${inst.details.job}`).join('\n');
}

/** List report: `id,state,port,host,password,job` lines, or JSON with masked passwords. */
export function formatListReport(instances: readonly DescribedInstance[], options: ReportOptions): string {
  const showPasswords = options.showPasswords ?? false;
  if (options.json) {
    return jsonReport(instances.map((inst) => toRecord(inst, showPasswords)));
  }
  return instances.map((inst) => {
    const { ssh, state, job } = inst.details;
    const port = ssh?.port ?? 0;
    const host = ssh?.host ?? 'None';
    const password = showPasswords ? ssh?.password ?? '' : '*';
    return `${inst.instanceId},${state},${port},${host},${password},${job}`;
  }).join('\n');
}

export class EventTiming {
  readonly startedAt: Date;
  endedAt?: Date;

  constructor(
    readonly name: string,
    now: Date = new Date(),
  ) {
    this.startedAt = now;
  }

  finish(now: Date = new Date()): this {
    this.endedAt = now;
    return this;
  }

  durationMs(): number {
    return (this.endedAt ?? this.startedAt).getTime() - this.startedAt.getTime();
  }
}

function clock(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/** `HH:MM:SS HH:MM:SS minutes name`, one line per event, UTC. */
export function formatTimingSummary(events: readonly EventTiming[]): string {
  const lines = ['Timing Summary (durations in minutes)'];
  for (const ev of events) {
    const start = clock(ev.startedAt);
    const end = ev.endedAt ? clock(ev.endedAt) : start;
    const minutes = (ev.durationMs() / 60_000).toFixed(1).padStart(7);
    lines.push(`${start} ${end} ${minutes} ${ev.name}`);
  }
  return lines.join('\n');
}
