import { z } from 'zod';

export const INSTANCE_STATES = ['initial', 'starting', 'started', 'failed', 'terminated'] as const;

export const SshTargetSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  user: z.string().min(1),
  password: z.string().nullish(),
});

export const InstanceDescriptorSchema = z.object({
  id: z.string().min(1),
  state: z.enum(INSTANCE_STATES),
  job: z.string().default(''),
  ssh: SshTargetSchema.optional(),
}).passthrough();

/** Reporting takes whatever state the control plane names, known or not. */
export const InstanceDetailsSchema = InstanceDescriptorSchema.extend({
  state: z.string().min(1),
});

export const ListedInstanceSchema = z.object({
  id: z.string().min(1),
}).passthrough();

export const InstanceListSchema = z.object({
  my: z.array(ListedInstanceSchema).default([]),
}).passthrough();

export const LaunchResponseSchema = z.array(ListedInstanceSchema);

export const AppVersionsSchema = z.array(z.object({
  value: z.union([z.number(), z.string()]),
}).passthrough());

export const LaunchFilterSchema = z.record(z.string(), z.unknown());

export const InstanceRecordSchema = z.object({
  instanceId: z.string().min(1),
  state: z.string(),
  ssh: SshTargetSchema.optional(),
}).passthrough();

export const LaunchedFileSchema = z.array(InstanceRecordSchema);
