/**
 * SSH invocation builder
 *
 * Produces the argv for the local ssh client with its network path replaced
 * by the session broker's proxying executable. Argument order is fixed.
 */

import type { SessionDescriptor, SessionStartResponse } from '../spi/index.js';
import { joinShellArgs } from './shell-quote.js';

/** Broker action name the proxying executable expects */
export const BROKER_ACTION = 'StartSession';

export const NULL_DEVICE = '/dev/null';

export interface ProxyCommandOptions {
  /** Path to the proxying executable (session-manager-plugin) */
  pluginPath: string;
  sessionResponse: SessionStartResponse;
  region: string;
  profile: string;
  descriptor: SessionDescriptor;
  brokerEndpoint: string;
}

export interface InvocationOptions extends ProxyCommandOptions {
  user: string;
  port: number;
  identityPath: string;
  agentMode: boolean;
  /** ssh -vv instead of -q */
  debug: boolean;
  /** Remote command tokens, appended after `--` without quoting */
  command?: readonly string[];
  /** ssh client binary (default: ssh) */
  sshBinary?: string;
}

export interface SshInvocation {
  /** Full argv, argv[0] being the ssh client */
  readonly argv: readonly string[];
  /** Shell command line of the proxying executable, before %-escaping */
  readonly proxyCommand: string;
}

/**
 * ssh expands %-tokens in IdentityFile and ProxyCommand values; `%%` is a
 * literal percent sign.
 */
export function escapeSshTokens(value: string): string {
  return value.replace(/%/g, '%%');
}

/**
 * Proxying executable argv, each token shell-quoted and space-joined.
 */
export function buildProxyCommand(options: ProxyCommandOptions): string {
  return joinShellArgs([
    options.pluginPath,
    JSON.stringify(options.sessionResponse),
    options.region,
    BROKER_ACTION,
    options.profile,
    JSON.stringify(options.descriptor),
    options.brokerEndpoint,
  ]);
}

export function buildInvocation(options: InvocationOptions): SshInvocation {
  const argv: string[] = [
    options.sshBinary ?? 'ssh',
    '-l',
    options.user,
    '-p',
    String(options.port),
    '-F',
    NULL_DEVICE,
  ];

  argv.push(options.debug ? '-vv' : '-q');

  const proxyCommand = buildProxyCommand(options);

  const sshOptions = [
    // Agent mode needs the agent's whole identity set, not just IdentityFile
    `IdentitiesOnly=${options.agentMode ? 'no' : 'yes'}`,
    `IdentityFile=${escapeSshTokens(options.identityPath)}`,
    // Host identity comes from the trust channel, so nothing is pinned locally
    `UserKnownHostsFile=${NULL_DEVICE}`,
    'StrictHostKeyChecking=no',
    `ProxyCommand=${escapeSshTokens(proxyCommand)}`,
  ];

  for (const option of sshOptions) {
    argv.push('-o', option);
  }

  // Never resolved: ProxyCommand takes over before any lookup
  argv.push(options.descriptor.Target);

  if (options.command && options.command.length > 0) {
    argv.push('--', ...options.command);
  }

  return Object.freeze({ argv: Object.freeze(argv), proxyCommand });
}
