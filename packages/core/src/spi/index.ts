/**
 * Service Provider Interface (SPI) definitions
 *
 * Capability interfaces the session orchestrator depends on. Cloud-backed
 * implementations live in @ssh-gate/aws; tests supply in-memory mocks.
 */

// ===== Trust broker =====

/**
 * Public key authorization request
 */
export interface PublicKeyGrantRequest {
  instanceId: string;
  availabilityZone: string;
  osUser: string;
  /** OpenSSH public key line (`ssh-ed25519 AAAA... comment`) */
  publicKey: string;
}

export interface PublicKeyGrantResult {
  success: boolean;
  requestId?: string;
  /** Broker error code when `success` is false */
  errorCode?: string;
  message?: string;
}

/**
 * Authorizes a public key for short-lived login to an (instance, OS user) pair.
 *
 * Implementations: InstanceConnectTrustBroker (@ssh-gate/aws)
 */
export interface TrustBrokerClient {
  readonly id: string;

  sendPublicKey(request: PublicKeyGrantRequest, signal?: AbortSignal): Promise<PublicKeyGrantResult>;

  /** Withdraw a grant early (optional; broker TTL is the backstop) */
  revokePublicKey?(request: PublicKeyGrantRequest): Promise<void>;
}

// ===== Session broker =====

/**
 * Session descriptor consumed by the session broker and the proxying executable.
 *
 * Field order is part of the wire format: Target, DocumentName, Parameters.
 */
export interface SessionDescriptor {
  readonly Target: string;
  readonly DocumentName: string;
  readonly Parameters: { readonly portNumber: readonly [string] };
}

/**
 * Opaque session start response, forwarded verbatim to the proxying executable
 */
export interface SessionStartResponse {
  SessionId: string;
  TokenValue: string;
  StreamUrl: string;
}

/**
 * Implementations: SsmSessionBroker (@ssh-gate/aws)
 */
export interface SessionBrokerClient {
  readonly id: string;

  /** Broker endpoint URL handed to the proxying executable */
  readonly endpointUrl: string;

  startSession(descriptor: SessionDescriptor, signal?: AbortSignal): Promise<SessionStartResponse>;

  terminateSession?(sessionId: string): Promise<void>;
}

// ===== Instance directory =====

export interface InstanceLocation {
  instanceId: string;
  availabilityZone: string;
}

/**
 * Resolves a human-readable instance identifier (name tag, IP, DNS name...)
 * to the instance id and its availability zone.
 *
 * @throws InstanceResolutionError when nothing matches
 */
export interface InstanceDirectory {
  resolve(identifier: string): Promise<InstanceLocation>;
}

// ===== Key agent =====

/**
 * Running SSH agent that can hold the ephemeral private key.
 */
export interface KeyAgent {
  addKey(privateKey: string, lifetimeSeconds: number): Promise<void>;
  /** Remove the identity matching the public key stored at `publicKeyPath` */
  removeKey(publicKeyPath: string): Promise<void>;
}

// ===== Local processes =====

export interface LaunchedProcess {
  readonly pid?: number;
  kill(signal: NodeJS.Signals): boolean;
  /** Resolves with the exit status; rejects with ProcessLaunchError if spawn fails */
  readonly exited: Promise<number>;
}

export interface ProcessLauncher {
  launch(command: string, args: readonly string[]): LaunchedProcess;
}

/**
 * Where operator signals come from (process in production, an emitter in tests)
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

// ===== Audit =====

export type AuditEventType = 'session_opened' | 'session_closed' | 'session_failed';

/**
 * Session lifecycle audit record
 */
export interface AuditEvent {
  event_id: string;
  timestamp: string; // ISO 8601
  event_type: AuditEventType;
  instance_id: string;
  region: string;
  profile: string;
  os_user: string;
  key_fingerprint?: string;
  broker_session_id?: string;
  exit_code?: number;
  error_code?: string;
  message?: string;
}

export interface AuditSink {
  emit(event: AuditEvent): Promise<void>;
  flush?(): Promise<void>;
}
