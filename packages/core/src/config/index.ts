/**
 * Configuration loader
 *
 * Reads ssh-gate.yaml, resolves ${ENV:VAR} references, validates with Zod and
 * fills connection defaults from the AWS environment variables.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { GateConfigSchema, REGION_PATTERN, type GateConfig, type HostConfig } from './schema.js';
import { DEFAULT_KEY_SIZES, type KeyAlgorithm } from '../keys/index.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

export type { GateConfig, HostConfig } from './schema.js';
export { GateConfigSchema, REGION_PATTERN } from './schema.js';

export const DEFAULT_PROFILE = 'default';
export const DEFAULT_REGION = 'eu-west-1';
export const CONFIG_FILE_NAME = 'config.yaml';

const MAX_CONFIG_BYTES = 1024 * 1024;

export interface ConfigLoadOptions {
  /** Environment to read defaults from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Home directory for `~` expansion (default: os.homedir()) */
  homeDir?: string;
}

/**
 * Default config location: $SSH_GATE_CONFIG, else ~/.ssh-gate/config.yaml
 */
export function defaultConfigPath(options: ConfigLoadOptions = {}): string {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  return env.SSH_GATE_CONFIG || path.join(homeDir, '.ssh-gate', CONFIG_FILE_NAME);
}

/**
 * Load configuration from YAML.
 *
 * An explicit `configPath` must exist; the default location may be absent, in
 * which case built-in defaults apply.
 *
 * @throws ConfigurationError if the file is unreadable, too large or invalid
 */
export async function loadConfig(
  configPath?: string,
  options: ConfigLoadOptions = {}
): Promise<GateConfig> {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const filePath = configPath ?? defaultConfigPath(options);

  let raw: unknown = {};
  try {
    const stats = await fs.stat(filePath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(
        `Config file ${filePath} exceeds 1MB size limit`,
        'config_too_large'
      );
    }
    const content = await fs.readFile(filePath, 'utf-8');
    raw = yaml.parse(content, { maxAliasCount: 50, schema: 'core', uniqueKeys: true }) ?? {};
    logger.debug(`[config] Loaded configuration from ${filePath}`);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    if (isMissingFile(error) && configPath === undefined) {
      logger.debug(`[config] No config file at ${filePath}, using defaults`);
    } else {
      throw new ConfigurationError(`Failed to load config ${filePath}: ${errorMessage(error)}`);
    }
  }

  let config: GateConfig;
  try {
    config = GateConfigSchema.parse(resolveEnvReferences(raw, env));
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid config ${filePath}: ${issues}`, 'config_invalid', {
        issues: error.issues.length,
      });
    }
    throw error;
  }

  return {
    ...config,
    gate_dir: expandHome(config.gate_dir, homeDir),
    plugin_path: expandHome(config.plugin_path, homeDir),
    debug: config.debug || isTruthy(env.SSH_GATE_DEBUG),
    audit: {
      ...config.audit,
      dir: config.audit.dir === undefined ? undefined : expandHome(config.audit.dir, homeDir),
    },
  };
}

/**
 * Replace `${ENV:VAR}` string values with the variable's value.
 */
export function resolveEnvReferences(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    const match = value.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (!match?.[1]) {
      return value;
    }
    const resolved = env[match[1]];
    if (resolved === undefined) {
      throw new ConfigurationError(
        `Environment variable ${match[1]} not found`,
        'config_resolution_error'
      );
    }
    return resolved;
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvReferences(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvReferences(item, env);
    }
    return resolved;
  }
  return value;
}

// ===== Target resolution =====

/**
 * Values given explicitly on the command line
 */
export interface TargetOverrides {
  profile?: string;
  region?: string;
  user?: string;
  port?: number;
  keyType?: KeyAlgorithm;
  keySize?: number;
  agentMode?: boolean;
}

export interface ResolvedTarget {
  /** Identifier for the instance directory (alias already expanded) */
  name: string;
  profile: string;
  region: string;
  user: string;
  port: number;
  keyType: KeyAlgorithm;
  keySize: number;
  agentMode: boolean;
  /** Matched host alias, if any */
  alias?: string;
}

/**
 * Expand a host alias and settle every connection parameter.
 *
 * Precedence: command line, then host entry, then config defaults, then the
 * AWS environment variables, then built-ins.
 *
 * @throws ConfigurationError if the resulting region is malformed
 */
export function resolveTarget(
  config: GateConfig,
  identifier: string,
  overrides: TargetOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedTarget {
  const host: HostConfig | undefined = config.hosts.find(entry => entry.alias === identifier);
  const defaults = config.defaults;

  const region =
    overrides.region ??
    host?.region ??
    defaults.region ??
    env.AWS_REGION ??
    env.AWS_DEFAULT_REGION ??
    DEFAULT_REGION;

  if (!REGION_PATTERN.test(region)) {
    throw new ConfigurationError(`Invalid region name: ${region}`, 'invalid_region');
  }

  const keyType = overrides.keyType ?? defaults.key_type;
  // A configured size belongs to the configured type
  const configuredSize = keyType === defaults.key_type ? defaults.key_size : undefined;

  return {
    name: host?.name ?? identifier,
    profile: overrides.profile ?? host?.profile ?? defaults.profile ?? env.AWS_PROFILE ?? DEFAULT_PROFILE,
    region,
    user: overrides.user ?? host?.user ?? defaults.user,
    port: overrides.port ?? host?.port ?? defaults.port,
    keyType,
    keySize: overrides.keySize ?? configuredSize ?? DEFAULT_KEY_SIZES[keyType],
    agentMode: overrides.agentMode ?? defaults.agent_mode,
    alias: host?.alias,
  };
}

function expandHome(value: string, homeDir: string): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
