/**
 * SessionOrchestrator tests
 *
 * End-to-end session lifecycle against mock brokers and a mock launcher.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { SessionOrchestrator, type SessionRequest, type SessionSettings } from '../src/session/index.js';
import { deriveKeyPath } from '../src/keys/index.js';
import {
  KeyGenerationError,
  ProcessLaunchError,
  SessionInterruptedError,
  SessionStartError,
  TrustInstallError,
} from '../src/utils/errors.js';
import type { AuditEvent, AuditSink } from '../src/spi/index.js';
import { MockAgent, MockLauncher, MockSessionBroker, MockTrustBroker } from './helpers.js';

class MockAudit implements AuditSink {
  events: AuditEvent[] = [];
  async emit(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

describe('SessionOrchestrator', () => {
  let tempDir: string;
  let keyPath: string;
  let events: string[];
  let trust: MockTrustBroker;
  let sessionBroker: MockSessionBroker;
  let launcher: MockLauncher;
  let agent: MockAgent;
  let audit: MockAudit;
  let signals: EventEmitter;
  let sleeps: number[];
  let now: (() => number) | undefined;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gate-session-'));
    keyPath = deriveKeyPath(tempDir, 'i-0123456789abcdef0', 'us-east-1', 'default');
    events = [];
    trust = new MockTrustBroker(events);
    sessionBroker = new MockSessionBroker(events);
    launcher = new MockLauncher(events);
    agent = new MockAgent(events);
    audit = new MockAudit();
    signals = new EventEmitter();
    sleeps = [];
    now = undefined;
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function orchestrator(settings: Partial<SessionSettings> = {}): SessionOrchestrator {
    return new SessionOrchestrator(
      {
        trustBroker: trust,
        sessionBroker,
        launcher,
        agent,
        audit,
        signals,
        now,
        sleep: async (ms: number) => {
          sleeps.push(ms);
        },
      },
      { pluginPath: 'session-manager-plugin', debug: false, ...settings }
    );
  }

  function request(agentMode = false): SessionRequest {
    return {
      instanceId: 'i-0123456789abcdef0',
      availabilityZone: 'us-east-1a',
      user: 'ec2-user',
      port: 22,
      region: 'us-east-1',
      profile: 'default',
      key: { algorithm: 'ed25519', size: 256, path: keyPath, agentMode },
    };
  }

  describe('end-to-end', () => {
    it('returns 0 and removes the key after a clean ssh exit', async () => {
      let modeDuringSession = -1;
      launcher.onLaunch = async () => {
        modeDuringSession = (await fs.stat(keyPath)).mode & 0o777;
      };

      const status = await orchestrator().run(request());

      expect(status).toBe(0);
      expect(modeDuringSession).toBe(0o600);
      expect(await exists(keyPath)).toBe(false);
      expect(await exists(`${keyPath}.pub`)).toBe(false);
      expect(events).toEqual(['grant', 'start:s-1', 'launch', 'terminate:s-1', 'revoke']);
    });

    it('spawns ssh with the key, the instance and the proxy command', async () => {
      await orchestrator().run({ ...request(), command: ['uptime'] });

      const call = launcher.calls[0];
      expect(call?.command).toBe('ssh');
      expect(call?.args).toContain(`IdentityFile=${keyPath}`);
      expect(call?.args).toContain('IdentitiesOnly=yes');
      expect(call?.args.slice(-3)).toEqual(['i-0123456789abcdef0', '--', 'uptime']);
      const proxy = call?.args.find(arg => arg.startsWith('ProxyCommand='));
      expect(proxy).toContain(' us-east-1 StartSession default ');
      expect(proxy).toContain('"TokenValue":"token-1"');
      expect(proxy?.endsWith(' https://ssm.us-east-1.amazonaws.com')).toBe(true);
    });

    it('raises TrustInstallError without spawning ssh when the broker rejects the key', async () => {
      trust.failWith = new Error('InvalidArgs: zone mismatch');

      await expect(orchestrator().run(request())).rejects.toBeInstanceOf(TrustInstallError);

      expect(launcher.calls).toHaveLength(0);
      expect(sessionBroker.descriptors).toHaveLength(0);
      expect(await exists(keyPath)).toBe(false);
      expect(await exists(`${keyPath}.pub`)).toBe(false);
    });

    it('returns 255 from a failed ssh login instead of throwing', async () => {
      launcher.statuses = [255];

      const status = await orchestrator().run(request());

      expect(status).toBe(255);
      expect(launcher.calls).toHaveLength(1);
      expect(await exists(keyPath)).toBe(false);
    });
  });

  describe('unwinding', () => {
    it('releases in reverse acquisition order exactly once', async () => {
      await orchestrator().run(request(true));

      expect(events).toEqual([
        'agent-add',
        'grant',
        'start:s-1',
        'launch',
        'terminate:s-1',
        'revoke',
        'agent-remove',
      ]);
    });

    it('stops after a key failure with nothing to release', async () => {
      agent.failAdd = new Error('agent locked');

      await expect(orchestrator().run(request(true))).rejects.toBeInstanceOf(KeyGenerationError);
      expect(events).toEqual([]);
      expect(trust.requests).toHaveLength(0);
    });

    it('releases grant and key when the broker session cannot start', async () => {
      sessionBroker.failWith = new Error('TargetNotConnected');

      await expect(orchestrator().run(request(true))).rejects.toBeInstanceOf(SessionStartError);
      expect(events).toEqual(['agent-add', 'grant', 'revoke', 'agent-remove']);
    });

    it('releases everything when ssh cannot be launched', async () => {
      launcher.launchError = new ProcessLaunchError('Cannot launch ssh: spawn ssh ENOENT');

      await expect(orchestrator().run(request(true))).rejects.toBeInstanceOf(ProcessLaunchError);
      expect(events).toEqual([
        'agent-add',
        'grant',
        'start:s-1',
        'launch',
        'terminate:s-1',
        'revoke',
        'agent-remove',
      ]);
    });
  });

  describe('signals', () => {
    it('aborts setup and unwinds on SIGINT before ssh starts', async () => {
      trust.onSend = () => {
        signals.emit('SIGINT', 'SIGINT');
      };

      const run = orchestrator().run(request());
      await expect(run).rejects.toBeInstanceOf(SessionInterruptedError);
      await expect(run).rejects.toThrow('Session setup interrupted by SIGINT');

      expect(launcher.calls).toHaveLength(0);
      expect(events).toEqual(['grant', 'revoke']);
      expect(await exists(keyPath)).toBe(false);
      expect(signals.listenerCount('SIGINT')).toBe(0);
    });

    it('forwards signals to a running ssh and still cleans up', async () => {
      launcher.holdOpen = true;
      launcher.onLaunch = () => {
        setImmediate(() => signals.emit('SIGTERM', 'SIGTERM'));
      };

      const status = await orchestrator().run(request());

      expect(status).toBe(143);
      expect(launcher.killed).toEqual(['SIGTERM']);
      expect(await exists(keyPath)).toBe(false);
      expect(signals.listenerCount('SIGTERM')).toBe(0);
    });
  });

  describe('connect retries', () => {
    it('does not retry by default', async () => {
      launcher.statuses = [255, 0];

      expect(await orchestrator().run(request())).toBe(255);
      expect(launcher.calls).toHaveLength(1);
    });

    it('retries an early 255 with a fresh broker session and backoff', async () => {
      launcher.statuses = [255, 255, 0];

      const status = await orchestrator({ connectRetries: 2, retryDelayMs: 500 }).run(request());

      expect(status).toBe(0);
      expect(sleeps).toEqual([500, 1000]);
      expect(trust.requests).toHaveLength(1);
      expect(events).toEqual([
        'grant',
        'start:s-1',
        'launch',
        'terminate:s-1',
        'start:s-2',
        'launch',
        'terminate:s-2',
        'start:s-3',
        'launch',
        'terminate:s-3',
        'revoke',
      ]);
    });

    it('gives up after the configured number of retries', async () => {
      launcher.statuses = [255, 255, 255];

      expect(await orchestrator({ connectRetries: 1 }).run(request())).toBe(255);
      expect(launcher.calls).toHaveLength(2);
    });

    it('does not retry a 255 that came after the early window', async () => {
      let clock = 0;
      now = () => (clock += 20_000);
      launcher.statuses = [255, 0];

      expect(await orchestrator({ connectRetries: 3 }).run(request())).toBe(255);
      expect(launcher.calls).toHaveLength(1);
    });
  });

  describe('audit', () => {
    it('records session open and close with the exit code', async () => {
      launcher.statuses = [3];

      await orchestrator().run(request());

      expect(audit.events.map(event => event.event_type)).toEqual([
        'session_opened',
        'session_closed',
      ]);
      expect(audit.events[0]).toMatchObject({
        instance_id: 'i-0123456789abcdef0',
        region: 'us-east-1',
        profile: 'default',
        os_user: 'ec2-user',
        broker_session_id: 's-1',
      });
      expect(audit.events[1]?.exit_code).toBe(3);
      expect(audit.events[1]?.key_fingerprint).toMatch(/^SHA256:/);
    });

    it('records failures with the error code', async () => {
      trust.result = { success: false, message: 'denied' };

      await expect(orchestrator().run(request())).rejects.toThrow(TrustInstallError);
      expect(audit.events).toHaveLength(1);
      expect(audit.events[0]).toMatchObject({
        event_type: 'session_failed',
        error_code: 'trust_install_failed',
      });
    });

    it('keeps going when the audit sink fails', async () => {
      audit.emit = async () => {
        throw new Error('disk full');
      };

      expect(await orchestrator().run(request())).toBe(0);
    });
  });
});
