/**
 * Session Orchestrator
 *
 * Key material → trust grant → broker session → ssh process, each acquisition
 * pushed onto a ResourceStack so any exit path unwinds in reverse order.
 *
 * A non-zero ssh exit is a result, not an error: it is returned as-is.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEvent,
  AuditEventType,
  AuditSink,
  KeyAgent,
  LaunchedProcess,
  ProcessLauncher,
  SessionBrokerClient,
  SessionDescriptor,
  SessionStartResponse,
  SignalSource,
  TrustBrokerClient,
} from '../spi/index.js';
import { KeyMaterial, type KeyAlgorithm } from '../keys/index.js';
import { TrustGrant } from '../trust/index.js';
import { buildInvocation, describeSession } from '../tunnel/index.js';
import { ResourceStack } from '../scope/index.js';
import { ChildProcessLauncher } from './process.js';
import {
  GateError,
  ProcessLaunchError,
  SessionInterruptedError,
  SessionStartError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Exit status ssh uses for its own failures, including refused authentication */
export const SSH_CONNECTION_FAILURE = 255;

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface SessionKeyOptions {
  algorithm: KeyAlgorithm;
  size: number;
  path: string;
  agentMode: boolean;
}

export interface SessionRequest {
  instanceId: string;
  availabilityZone: string;
  user: string;
  port: number;
  region: string;
  profile: string;
  key: SessionKeyOptions;
  /** Remote command tokens; interactive shell when absent */
  command?: readonly string[];
}

export interface SessionSettings {
  /** Path to the proxying executable */
  pluginPath: string;
  debug: boolean;
  sshBinary?: string;
  /**
   * Extra ssh attempts when the client exits 255 shortly after launch. Covers
   * the window where the trust grant has not reached the instance yet.
   */
  connectRetries?: number;
  retryDelayMs?: number;
  earlyFailureWindowMs?: number;
}

export interface SessionDependencies {
  trustBroker: TrustBrokerClient;
  sessionBroker: SessionBrokerClient;
  launcher?: ProcessLauncher;
  agent?: KeyAgent;
  audit?: AuditSink;
  signals?: SignalSource;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface RunState {
  controller: AbortController;
  child?: LaunchedProcess;
  brokerSessionId?: string;
  opened?: boolean;
}

type AuditDetails = Partial<
  Pick<AuditEvent, 'key_fingerprint' | 'broker_session_id' | 'exit_code' | 'error_code' | 'message'>
>;

interface AttemptResult {
  status: number;
  elapsedMs: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export class SessionOrchestrator {
  private launcher: ProcessLauncher;
  private signals: SignalSource;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private settings: Required<SessionSettings>;

  constructor(
    private deps: SessionDependencies,
    settings: SessionSettings
  ) {
    this.launcher = deps.launcher ?? new ChildProcessLauncher();
    this.signals = deps.signals ?? process;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.settings = {
      pluginPath: settings.pluginPath,
      debug: settings.debug,
      sshBinary: settings.sshBinary ?? 'ssh',
      connectRetries: settings.connectRetries ?? 0,
      retryDelayMs: settings.retryDelayMs ?? 1000,
      earlyFailureWindowMs: settings.earlyFailureWindowMs ?? 10_000,
    };
  }

  /**
   * Run one SSH session and return the ssh client's exit status.
   *
   * @throws KeyGenerationError, TrustInstallError, SessionStartError,
   *   ProcessLaunchError, SessionInterruptedError (after unwinding)
   */
  async run(request: SessionRequest): Promise<number> {
    const stack = new ResourceStack();
    const state: RunState = { controller: new AbortController() };

    const onSignal = (signal: NodeJS.Signals): void => {
      if (state.child) {
        logger.debug(`[session] Forwarding ${signal} to ssh`);
        state.child.kill(signal);
      } else if (!state.controller.signal.aborted) {
        logger.warn(`[session] Received ${signal} during setup, unwinding`);
        state.controller.abort(signal);
      }
    };
    for (const signal of FORWARDED_SIGNALS) {
      this.signals.on(signal, onSignal);
    }

    let fingerprint: string | undefined;

    try {
      const key = await stack.acquire(
        'key material',
        () => KeyMaterial.create({ ...request.key, agent: this.deps.agent }),
        material => material.dispose()
      );
      fingerprint = key.fingerprint;
      this.checkInterrupted(state);

      await stack.acquire(
        'trust grant',
        () =>
          TrustGrant.install(
            {
              instanceId: request.instanceId,
              availabilityZone: request.availabilityZone,
              osUser: request.user,
              publicKey: key.publicKey(),
              fingerprint: key.fingerprint,
            },
            this.deps.trustBroker,
            state.controller.signal
          ),
        grant => grant.release()
      );
      this.checkInterrupted(state);

      const descriptor = describeSession(request.instanceId, request.port);

      logger.info(
        `[session] Opening SSH session on ${request.user}@${request.instanceId} (${request.region}) via profile ${request.profile || '<default>'}`
      );

      let result = await this.attempt(request, descriptor, key, state);

      for (let retry = 0; this.shouldRetry(result, retry); retry++) {
        const delay = this.settings.retryDelayMs * 2 ** retry;
        logger.warn(
          `[session] ssh exited ${result.status} after ${result.elapsedMs}ms; trust grant may still be propagating, retrying in ${delay}ms (${retry + 1}/${this.settings.connectRetries})`
        );
        await this.sleep(delay);
        this.checkInterrupted(state);
        result = await this.attempt(request, descriptor, key, state);
      }

      await this.emitAudit('session_closed', request, {
        key_fingerprint: fingerprint,
        broker_session_id: state.brokerSessionId,
        exit_code: result.status,
      });
      logger.info(`[session] SSH session on ${request.instanceId} ended with status ${result.status}`);
      return result.status;
    } catch (error) {
      const primary =
        state.controller.signal.aborted && !(error instanceof SessionInterruptedError)
          ? new SessionInterruptedError(String(state.controller.signal.reason))
          : error;
      await this.emitAudit('session_failed', request, {
        key_fingerprint: fingerprint,
        broker_session_id: state.brokerSessionId,
        error_code: primary instanceof GateError ? primary.code : 'internal_error',
        message: errorMessage(primary),
      });
      throw primary;
    } finally {
      for (const signal of FORWARDED_SIGNALS) {
        this.signals.off(signal, onSignal);
      }
      await stack.unwind();
    }
  }

  /**
   * One connection attempt with its own broker session.
   */
  private async attempt(
    request: SessionRequest,
    descriptor: SessionDescriptor,
    key: KeyMaterial,
    state: RunState
  ): Promise<AttemptResult> {
    const attemptStack = new ResourceStack();
    try {
      const response = await attemptStack.acquire(
        'broker session',
        () => this.startBrokerSession(descriptor, state.controller.signal),
        started => this.terminateBrokerSession(started.SessionId)
      );
      state.brokerSessionId = response.SessionId;
      this.checkInterrupted(state);

      const invocation = buildInvocation({
        sshBinary: this.settings.sshBinary,
        user: request.user,
        port: request.port,
        identityPath: key.path,
        agentMode: key.agentMode,
        debug: this.settings.debug,
        pluginPath: this.settings.pluginPath,
        sessionResponse: response,
        region: request.region,
        profile: request.profile,
        descriptor,
        brokerEndpoint: this.deps.sessionBroker.endpointUrl,
        command: request.command,
      });

      const [command, ...args] = invocation.argv;
      if (!command) {
        throw new ProcessLaunchError('Empty ssh invocation');
      }

      if (!state.opened) {
        state.opened = true;
        await this.emitAudit('session_opened', request, {
          key_fingerprint: key.fingerprint,
          broker_session_id: response.SessionId,
        });
      }

      const startedAt = this.now();
      const child = this.launcher.launch(command, args);
      state.child = child;
      try {
        const status = await child.exited;
        return { status, elapsedMs: this.now() - startedAt };
      } finally {
        state.child = undefined;
      }
    } finally {
      await attemptStack.unwind();
    }
  }

  private shouldRetry(result: AttemptResult, retry: number): boolean {
    return (
      result.status === SSH_CONNECTION_FAILURE &&
      result.elapsedMs < this.settings.earlyFailureWindowMs &&
      retry < this.settings.connectRetries
    );
  }

  private async startBrokerSession(
    descriptor: SessionDescriptor,
    signal: AbortSignal
  ): Promise<SessionStartResponse> {
    try {
      const response = await this.deps.sessionBroker.startSession(descriptor, signal);
      logger.debug(`[session] Broker session ${response.SessionId} started`);
      return response;
    } catch (error) {
      throw new SessionStartError(
        `Session broker ${this.deps.sessionBroker.id} could not start a session on ${descriptor.Target}: ${errorMessage(error)}`,
        { broker: this.deps.sessionBroker.id, target: descriptor.Target }
      );
    }
  }

  private async terminateBrokerSession(sessionId: string): Promise<void> {
    if (!this.deps.sessionBroker.terminateSession) {
      return;
    }
    try {
      await this.deps.sessionBroker.terminateSession(sessionId);
      logger.debug(`[session] Broker session ${sessionId} terminated`);
    } catch (error) {
      logger.warn(`[session] Failed to terminate broker session ${sessionId}: ${errorMessage(error)}`);
    }
  }

  private checkInterrupted(state: RunState): void {
    if (state.controller.signal.aborted) {
      throw new SessionInterruptedError(String(state.controller.signal.reason));
    }
  }

  private async emitAudit(
    type: AuditEventType,
    request: SessionRequest,
    extra: AuditDetails
  ): Promise<void> {
    if (!this.deps.audit) {
      return;
    }
    const event: AuditEvent = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      event_type: type,
      instance_id: request.instanceId,
      region: request.region,
      profile: request.profile,
      os_user: request.user,
      ...extra,
    };
    try {
      await this.deps.audit.emit(event);
    } catch (error) {
      logger.warn(`[session] Audit emit failed for ${type}: ${errorMessage(error)}`);
    }
  }
}
