/**
 * Command line parsing
 *
 * Usage:
 *   ssh-gate ssh [options] <instance> [-- command...]
 */

import { ConfigurationError, isKeyAlgorithm, type KeyAlgorithm } from '@ssh-gate/core';

export type CliCommand = 'ssh' | 'help' | 'version';

export interface CliArgs {
  command: CliCommand;
  instance?: string;
  user?: string;
  port?: number;
  keyType?: KeyAlgorithm;
  keySize?: number;
  profile?: string;
  region?: string;
  agentMode?: boolean;
  configPath?: string;
  debug?: boolean;
  /** Tokens after the instance (or after `--`), run remotely */
  remoteCommand: string[];
}

export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'usage_error');
    this.name = 'UsageError';
  }
}

const VALUE_OPTIONS = new Set([
  '-u',
  '--user',
  '-p',
  '--port',
  '--key-type',
  '--key-size',
  '--profile',
  '--region',
  '-c',
  '--config',
]);

/**
 * Parse argv (without the node and script entries).
 *
 * Options may come before the subcommand or between it and the instance.
 * Everything after the instance name is the remote command.
 *
 * @throws UsageError on unknown options, missing values or a missing instance
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const parsed: CliArgs = { command: 'help', remoteCommand: [] };
  let subcommand: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--') {
      parsed.remoteCommand = argv.slice(i + 1);
      break;
    }

    if (arg.startsWith('-') && arg !== '-') {
      const [flag, inline] = splitInline(arg);
      let value: string | undefined;
      if (VALUE_OPTIONS.has(flag)) {
        value = inline ?? argv[i + 1];
        if (value === undefined) {
          throw new UsageError(`Option ${flag} requires a value`);
        }
        if (inline === undefined) {
          i++;
        }
      } else if (inline !== undefined) {
        throw new UsageError(`Option ${flag} does not take a value`);
      }

      switch (flag) {
        case '-u':
        case '--user':
          parsed.user = requireNonEmpty(flag, value);
          break;
        case '-p':
        case '--port':
          parsed.port = parseInteger(flag, value, 1, 65535);
          break;
        case '--key-type': {
          const keyType = requireNonEmpty(flag, value);
          if (!isKeyAlgorithm(keyType)) {
            throw new UsageError(`Unsupported key type: ${keyType} (expected rsa or ed25519)`);
          }
          parsed.keyType = keyType;
          break;
        }
        case '--key-size':
          parsed.keySize = parseInteger(flag, value, 1, 16384);
          break;
        case '--profile':
          parsed.profile = requireNonEmpty(flag, value);
          break;
        case '--region':
          parsed.region = requireNonEmpty(flag, value);
          break;
        case '-c':
        case '--config':
          parsed.configPath = requireNonEmpty(flag, value);
          break;
        case '-a':
        case '--agent':
          parsed.agentMode = true;
          break;
        case '-d':
        case '--debug':
          parsed.debug = true;
          break;
        case '-h':
        case '--help':
          return { ...parsed, command: 'help' };
        case '-V':
        case '--version':
          return { ...parsed, command: 'version' };
        default:
          throw new UsageError(`Unknown option: ${flag}`);
      }
      continue;
    }

    if (subcommand === undefined) {
      subcommand = arg;
      if (subcommand !== 'ssh') {
        throw new UsageError(`Unknown command: ${subcommand}`);
      }
      parsed.command = 'ssh';
      continue;
    }

    parsed.instance = arg;
    parsed.remoteCommand = argv.slice(i + 1);
    if (parsed.remoteCommand[0] === '--') {
      parsed.remoteCommand = parsed.remoteCommand.slice(1);
    }
    break;
  }

  if (parsed.command === 'ssh' && !parsed.instance) {
    throw new UsageError('Missing instance name');
  }

  return parsed;
}

export const USAGE = `
ssh-gate v0.1.0

Open an SSH session to an EC2 instance with a single-use key, tunnelled
through AWS Systems Manager. No inbound port or standing key required.

Usage:
  ssh-gate ssh [options] <instance> [-- command...]

Instance:
  i-0123456789abcdef0    instance id
  10.0.0.5               private or public IPv4 address
  ip-10-0-0-5.ec2.internal
                         private or public DNS name
  asg:<group>            first instance of an auto scaling group
  <tag-key>:<tag-value>  tag match
  <name>                 Name tag, or a host alias from the config file

Options:
  -u, --user <user>        OS user to log in as (default: ec2-user)
  -p, --port <port>        SSH port on the instance (default: 22)
  --key-type <type>        rsa|ed25519 (default: rsa)
  --key-size <bits>        RSA: 2048|3072|4096|8192, ED25519: 256
  --profile <name>         AWS profile (default: $AWS_PROFILE or default)
  --region <region>        AWS region (default: $AWS_DEFAULT_REGION or eu-west-1)
  -a, --agent              Load the key into ssh-agent instead of a key file
  -c, --config <path>      Config file (default: ~/.ssh-gate/config.yaml)
  -d, --debug              Verbose logging and ssh -vv
  -h, --help               Show this help message
  -V, --version            Show version

Examples:
  # Interactive shell on the instance tagged Name=bastion
  ssh-gate ssh bastion

  # Run one command as ubuntu through a specific profile
  ssh-gate ssh --profile prod -u ubuntu web-1 -- uptime
`;

function splitInline(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) {
    return [arg, undefined];
  }
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

function requireNonEmpty(flag: string, value: string | undefined): string {
  if (!value) {
    throw new UsageError(`Option ${flag} requires a value`);
  }
  return value;
}

function parseInteger(flag: string, value: string | undefined, min: number, max: number): number {
  const text = requireNonEmpty(flag, value);
  if (!/^\d+$/.test(text)) {
    throw new UsageError(`Option ${flag} expects a number, got ${text}`);
  }
  const number = parseInt(text, 10);
  if (number < min || number > max) {
    throw new UsageError(`Option ${flag} must be between ${min} and ${max}`);
  }
  return number;
}
