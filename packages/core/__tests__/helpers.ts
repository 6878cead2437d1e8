/**
 * Shared test doubles for the session SPI
 */

import type {
  KeyAgent,
  LaunchedProcess,
  ProcessLauncher,
  PublicKeyGrantRequest,
  PublicKeyGrantResult,
  SessionBrokerClient,
  SessionDescriptor,
  SessionStartResponse,
  TrustBrokerClient,
} from '../src/spi/index.js';

export class MockTrustBroker implements TrustBrokerClient {
  id = 'mock-trust';
  requests: PublicKeyGrantRequest[] = [];
  revoked: PublicKeyGrantRequest[] = [];
  result: PublicKeyGrantResult = { success: true, requestId: 'req-1' };
  failWith?: Error;
  onSend?: () => void;

  constructor(private events: string[] = []) {}

  async sendPublicKey(request: PublicKeyGrantRequest): Promise<PublicKeyGrantResult> {
    this.requests.push(request);
    this.events.push('grant');
    this.onSend?.();
    if (this.failWith) {
      throw this.failWith;
    }
    return this.result;
  }

  async revokePublicKey(request: PublicKeyGrantRequest): Promise<void> {
    this.revoked.push(request);
    this.events.push('revoke');
  }
}

export class MockSessionBroker implements SessionBrokerClient {
  id = 'mock-session';
  endpointUrl = 'https://ssm.us-east-1.amazonaws.com';
  descriptors: SessionDescriptor[] = [];
  terminated: string[] = [];
  failWith?: Error;
  private counter = 0;

  constructor(private events: string[] = []) {}

  async startSession(descriptor: SessionDescriptor): Promise<SessionStartResponse> {
    this.descriptors.push(descriptor);
    if (this.failWith) {
      throw this.failWith;
    }
    this.counter += 1;
    this.events.push(`start:s-${this.counter}`);
    return {
      SessionId: `s-${this.counter}`,
      TokenValue: `token-${this.counter}`,
      StreamUrl: `wss://ssmmessages.us-east-1.amazonaws.com/v1/data-channel/s-${this.counter}`,
    };
  }

  async terminateSession(sessionId: string): Promise<void> {
    this.terminated.push(sessionId);
    this.events.push(`terminate:${sessionId}`);
  }
}

export class MockAgent implements KeyAgent {
  added: { privateKey: string; lifetimeSeconds: number }[] = [];
  removed: string[] = [];
  failAdd?: Error;

  constructor(private events: string[] = []) {}

  async addKey(privateKey: string, lifetimeSeconds: number): Promise<void> {
    if (this.failAdd) {
      throw this.failAdd;
    }
    this.added.push({ privateKey, lifetimeSeconds });
    this.events.push('agent-add');
  }

  async removeKey(publicKeyPath: string): Promise<void> {
    this.removed.push(publicKeyPath);
    this.events.push('agent-remove');
  }
}

interface LaunchCall {
  command: string;
  args: readonly string[];
}

/**
 * Launcher whose processes exit with queued statuses. With `holdOpen`, a
 * process only exits when killed (status 128 + 2 for SIGINT).
 */
export class MockLauncher implements ProcessLauncher {
  calls: LaunchCall[] = [];
  statuses: number[] = [];
  killed: NodeJS.Signals[] = [];
  holdOpen = false;
  launchError?: Error;
  onLaunch?: (call: LaunchCall) => void | Promise<void>;

  constructor(private events: string[] = []) {}

  launch(command: string, args: readonly string[]): LaunchedProcess {
    const call = { command, args };
    this.calls.push(call);
    this.events.push('launch');

    let finish: (status: number) => void = () => undefined;
    const exited = new Promise<number>((resolve, reject) => {
      if (this.launchError) {
        reject(this.launchError);
        return;
      }
      finish = resolve;
    });

    const hook = Promise.resolve(this.onLaunch?.(call));
    if (!this.launchError && !this.holdOpen) {
      const status = this.statuses.shift() ?? 0;
      void hook.then(() => finish(status));
    }

    return {
      pid: 4242,
      kill: (signal: NodeJS.Signals) => {
        this.killed.push(signal);
        finish(signal === 'SIGINT' ? 130 : 143);
        return true;
      },
      exited,
    };
  }
}
