/**
 * Configuration schema (Zod)
 *
 * Validates ssh-gate.yaml. Every section is optional; defaults match running
 * with no config file at all.
 */

import { z } from 'zod';

/** Regions look like `eu-west-1`, `us-gov-west-1`, `ap-southeast-3` */
export const REGION_PATTERN = /^[a-z]{2}(-gov|-iso[a-z]?)?-[a-z]+-\d+$/;

const RegionSchema = z.string().regex(REGION_PATTERN, 'Invalid region name');

// ===== Connection defaults =====

const DefaultsConfigSchema = z.object({
  profile: z.string().optional(),
  region: RegionSchema.optional(),
  user: z.string().min(1).default('ec2-user'),
  port: z.number().int().min(1).max(65535).default(22),
  key_type: z.enum(['rsa', 'ed25519']).default('rsa'),
  /** Bits; algorithm default when omitted */
  key_size: z.number().int().positive().optional(),
  agent_mode: z.boolean().default(false),
});

// ===== Host aliases =====

const HostConfigSchema = z.object({
  alias: z.string().min(1),
  /** Instance identifier passed to the instance directory */
  name: z.string().min(1),
  profile: z.string().optional(),
  region: RegionSchema.optional(),
  user: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
});

// ===== ssh client behaviour =====

const SshConfigSchema = z.object({
  binary: z.string().min(1).default('ssh'),
  /** Retries of the ssh attempt (never the grant) after an early exit 255 */
  connect_retries: z.number().int().min(0).max(10).default(0),
  retry_delay_ms: z.number().int().min(0).max(60000).default(1000),
  early_failure_window_ms: z.number().int().min(0).max(300000).default(10000),
});

// ===== Session audit trail =====

const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Defaults to <gate_dir>/audit */
  dir: z.string().optional(),
});

export const GateConfigSchema = z.object({
  gate_dir: z.string().default('~/.ssh-gate'),
  plugin_path: z.string().min(1).default('session-manager-plugin'),
  /** Session broker endpoint override (VPC endpoints, testing) */
  ssm_endpoint: z.string().url().optional(),
  debug: z.boolean().default(false),
  defaults: DefaultsConfigSchema.default({}),
  ssh: SshConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
  hosts: z.array(HostConfigSchema).default([]),
});

export type GateConfig = z.infer<typeof GateConfigSchema>;
export type HostConfig = z.infer<typeof HostConfigSchema>;
