/**
 * Tunnel tests
 *
 * Session descriptor shape, shell quoting and the ssh argv layout.
 */

import { describe, it, expect } from 'vitest';
import { execFileSync } from 'child_process';
import {
  buildInvocation,
  buildProxyCommand,
  describeSession,
  escapeSshTokens,
  joinShellArgs,
  quoteShellArg,
  type InvocationOptions,
} from '../src/tunnel/index.js';

/**
 * Words /bin/sh produces from a command line, NUL-separated by printf
 */
function shellWords(commandLine: string): string[] {
  const output = execFileSync('/bin/sh', ['-c', `printf '%s\\0' ${commandLine}`], {
    encoding: 'utf-8',
  });
  return output.split('\0').slice(0, -1);
}

const RESPONSE = {
  SessionId: 's-1',
  TokenValue: 'tok',
  StreamUrl: 'wss://x/s-1',
};

function baseOptions(overrides: Partial<InvocationOptions> = {}): InvocationOptions {
  return {
    user: 'ec2-user',
    port: 22,
    identityPath: '/home/operator/.ssh-gate/i-0123456789abcdef0.us-east-1.default',
    agentMode: false,
    debug: false,
    pluginPath: 'session-manager-plugin',
    sessionResponse: RESPONSE,
    region: 'us-east-1',
    profile: 'default',
    descriptor: describeSession('i-0123456789abcdef0', 22),
    brokerEndpoint: 'https://ssm.us-east-1.amazonaws.com',
    ...overrides,
  };
}

const EXPECTED_PROXY =
  `session-manager-plugin '{"SessionId":"s-1","TokenValue":"tok","StreamUrl":"wss://x/s-1"}' ` +
  `us-east-1 StartSession default ` +
  `'{"Target":"i-0123456789abcdef0","DocumentName":"AWS-StartSSHSession","Parameters":{"portNumber":["22"]}}' ` +
  `https://ssm.us-east-1.amazonaws.com`;

describe('describeSession', () => {
  it('targets the SSH bridging document with a stringified port', () => {
    const descriptor = describeSession('i-0123456789abcdef0', 2222);

    expect(JSON.stringify(descriptor)).toBe(
      '{"Target":"i-0123456789abcdef0","DocumentName":"AWS-StartSSHSession","Parameters":{"portNumber":["2222"]}}'
    );
    expect(Object.isFrozen(descriptor)).toBe(true);
  });
});

describe('quoteShellArg', () => {
  it('leaves safe tokens alone', () => {
    expect(quoteShellArg('i-0123456789abcdef0')).toBe('i-0123456789abcdef0');
    expect(quoteShellArg('https://ssm.us-east-1.amazonaws.com')).toBe(
      'https://ssm.us-east-1.amazonaws.com'
    );
  });

  it('quotes empty strings', () => {
    expect(quoteShellArg('')).toBe("''");
  });

  it('single-quotes metacharacters', () => {
    expect(quoteShellArg('a b')).toBe("'a b'");
    expect(quoteShellArg('$HOME;rm -rf /')).toBe("'$HOME;rm -rf /'");
  });

  it('escapes embedded single quotes', () => {
    expect(quoteShellArg("it's")).toBe(`'it'"'"'s'`);
  });

  it('survives one round of shell parsing', () => {
    const values = [
      'plain',
      '',
      'with space',
      "o'brien",
      '"double"',
      '$(touch /tmp/pwned)',
      '`id`',
      'a;b|c&d>e<f',
      'back\\slash',
      '{"Target":"i-1","Parameters":{"portNumber":["22"]}}',
      "prof'ile $x \"y\"",
      'tab\there',
      'new\nline',
      '100%',
      'team%2Eprod %h %%',
      '*.pem',
      '~operator',
    ];

    expect(shellWords(joinShellArgs(values))).toEqual(values);
  });
});

describe('buildProxyCommand', () => {
  it('joins the seven proxying arguments in order', () => {
    expect(buildProxyCommand(baseOptions())).toBe(EXPECTED_PROXY);
  });

  it('round-trips hostile instance ids, profiles and payloads', () => {
    const descriptor = describeSession("i-1'; touch /tmp/x; '", 22);
    const sessionResponse = { ...RESPONSE, TokenValue: `tok'en "$(id)"` };
    const options = baseOptions({ profile: 'dev team $HOME 50%', descriptor, sessionResponse });

    expect(shellWords(buildProxyCommand(options))).toEqual([
      'session-manager-plugin',
      JSON.stringify(sessionResponse),
      'us-east-1',
      'StartSession',
      'dev team $HOME 50%',
      JSON.stringify(descriptor),
      'https://ssm.us-east-1.amazonaws.com',
    ]);
  });

  it('keeps an empty profile as its own argument', () => {
    const words = shellWords(buildProxyCommand(baseOptions({ profile: '' })));
    expect(words).toHaveLength(7);
    expect(words[4]).toBe('');
  });
});

describe('buildInvocation', () => {
  it('builds the full argv in the fixed order', () => {
    const invocation = buildInvocation(baseOptions());

    expect(invocation.argv).toEqual([
      'ssh',
      '-l',
      'ec2-user',
      '-p',
      '22',
      '-F',
      '/dev/null',
      '-q',
      '-o',
      'IdentitiesOnly=yes',
      '-o',
      'IdentityFile=/home/operator/.ssh-gate/i-0123456789abcdef0.us-east-1.default',
      '-o',
      'UserKnownHostsFile=/dev/null',
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      `ProxyCommand=${EXPECTED_PROXY}`,
      'i-0123456789abcdef0',
    ]);
    expect(invocation.proxyCommand).toBe(EXPECTED_PROXY);
    expect(Object.isFrozen(invocation.argv)).toBe(true);
  });

  it('uses -vv in debug mode', () => {
    const { argv } = buildInvocation(baseOptions({ debug: true }));
    expect(argv[7]).toBe('-vv');
    expect(argv).not.toContain('-q');
  });

  it('sets IdentitiesOnly=no if and only if agent mode is on', () => {
    const agent = buildInvocation(baseOptions({ agentMode: true })).argv;
    const file = buildInvocation(baseOptions({ agentMode: false })).argv;

    expect(agent.filter(arg => arg.startsWith('IdentitiesOnly='))).toEqual(['IdentitiesOnly=no']);
    expect(file.filter(arg => arg.startsWith('IdentitiesOnly='))).toEqual(['IdentitiesOnly=yes']);
  });

  it('appends the remote command verbatim after --', () => {
    const { argv } = buildInvocation(
      baseOptions({ command: ['sudo', 'systemctl', 'status', 'nginx; echo $HOME'] })
    );

    expect(argv.slice(-6)).toEqual([
      'i-0123456789abcdef0',
      '--',
      'sudo',
      'systemctl',
      'status',
      'nginx; echo $HOME',
    ]);
  });

  it('omits the separator for an empty command', () => {
    const { argv } = buildInvocation(baseOptions({ command: [] }));
    expect(argv[argv.length - 1]).toBe('i-0123456789abcdef0');
    expect(argv).not.toContain('--');
  });

  it('escapes % in the options ssh expands tokens in', () => {
    const identityPath = '/home/operator/.ssh-gate/i-1.us-east-1.team%2Eprod';
    const invocation = buildInvocation(baseOptions({ identityPath, profile: 'ops%team' }));

    expect(invocation.argv).toContain(
      'IdentityFile=/home/operator/.ssh-gate/i-1.us-east-1.team%%2Eprod'
    );
    expect(invocation.proxyCommand).toContain(' StartSession ops%team ');
    expect(invocation.argv).toContain(`ProxyCommand=${escapeSshTokens(invocation.proxyCommand)}`);
    expect(escapeSshTokens(invocation.proxyCommand)).toContain(' StartSession ops%%team ');
  });

  it('honours a custom ssh binary and port', () => {
    const { argv } = buildInvocation(
      baseOptions({ sshBinary: '/usr/local/bin/ssh', port: 2222, descriptor: describeSession('i-1', 2222) })
    );
    expect(argv.slice(0, 5)).toEqual(['/usr/local/bin/ssh', '-l', 'ec2-user', '-p', '2222']);
  });
});
