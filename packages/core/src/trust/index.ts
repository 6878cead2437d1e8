/**
 * Temporary trust grant
 *
 * Binds a public key to an (instance, OS user) pair through the trust broker.
 * The broker expires the grant on its own after TRUST_GRANT_TTL_SECONDS, so a
 * grant leaked by a crash needs no cleanup from this side.
 */

import type {
  PublicKeyGrantRequest,
  PublicKeyGrantResult,
  TrustBrokerClient,
} from '../spi/index.js';
import { TrustInstallError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Broker-enforced validity window (EC2 Instance Connect uses 60 seconds) */
export const TRUST_GRANT_TTL_SECONDS = 60;

export interface TrustGrantRequest {
  instanceId: string;
  availabilityZone: string;
  osUser: string;
  publicKey: string;
  fingerprint: string;
}

export class TrustGrant {
  private released = false;

  private constructor(
    readonly instanceId: string,
    readonly availabilityZone: string,
    readonly osUser: string,
    readonly fingerprint: string,
    readonly grantedAt: Date,
    readonly requestId: string | undefined,
    private readonly grantRequest: PublicKeyGrantRequest,
    private readonly broker: TrustBrokerClient
  ) {}

  /**
   * Ask the trust broker to authorize `publicKey` for `osUser`.
   *
   * The grant propagates to the instance asynchronously; the first SSH attempt
   * can still be refused for a moment after this resolves.
   *
   * @throws TrustInstallError wrapping the broker's rejection
   */
  static async install(
    request: TrustGrantRequest,
    broker: TrustBrokerClient,
    signal?: AbortSignal
  ): Promise<TrustGrant> {
    const grantRequest: PublicKeyGrantRequest = {
      instanceId: request.instanceId,
      availabilityZone: request.availabilityZone,
      osUser: request.osUser,
      publicKey: request.publicKey,
    };

    let result: PublicKeyGrantResult;
    try {
      result = await broker.sendPublicKey(grantRequest, signal);
    } catch (error) {
      throw new TrustInstallError(
        `Trust broker ${broker.id} rejected key for ${request.osUser}@${request.instanceId}: ${errorMessage(error)}`,
        {
          broker: broker.id,
          instance_id: request.instanceId,
          cause: error instanceof Error ? error.name : undefined,
        }
      );
    }

    if (!result.success) {
      throw new TrustInstallError(
        `Trust broker ${broker.id} rejected key for ${request.osUser}@${request.instanceId}: ${result.message ?? 'request was not successful'}`,
        { broker: broker.id, instance_id: request.instanceId, broker_code: result.errorCode }
      );
    }

    logger.info(
      `[trust] Key ${request.fingerprint} authorized for ${request.osUser}@${request.instanceId} (${request.availabilityZone}) for ${TRUST_GRANT_TTL_SECONDS}s`
    );

    return new TrustGrant(
      request.instanceId,
      request.availabilityZone,
      request.osUser,
      request.fingerprint,
      new Date(),
      result.requestId,
      grantRequest,
      broker
    );
  }

  get expiresAt(): Date {
    return new Date(this.grantedAt.getTime() + TRUST_GRANT_TTL_SECONDS * 1000);
  }

  /**
   * Best-effort revoke. Falls back to TTL expiry when the broker has no revoke
   * call. Never throws.
   */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;

    if (!this.broker.revokePublicKey) {
      logger.debug(`[trust] ${this.broker.id} has no revoke; grant expires at ${this.expiresAt.toISOString()}`);
      return;
    }

    try {
      await this.broker.revokePublicKey(this.grantRequest);
      logger.debug(`[trust] Revoked key ${this.fingerprint}`);
    } catch (error) {
      logger.warn(`[trust] Revoke failed for key ${this.fingerprint}: ${errorMessage(error)}`);
    }
  }
}
