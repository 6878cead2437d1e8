/**
 * SSM session broker
 *
 * StartSession with the AWS-StartSSHSession document; the response is handed
 * unchanged to session-manager-plugin, which opens the data channel.
 */

import {
  StartSessionCommand,
  TerminateSessionCommand,
  type SSMClient,
} from '@aws-sdk/client-ssm';
import {
  SessionStartError,
  logger,
  type SessionBrokerClient,
  type SessionDescriptor,
  type SessionStartResponse,
} from '@ssh-gate/core';
import { ssmEndpointUrl } from './clients.js';

export interface SsmSessionBrokerOptions {
  region: string;
  /** Endpoint override; the regional endpoint otherwise */
  endpoint?: string;
}

export class SsmSessionBroker implements SessionBrokerClient {
  readonly id = 'ssm';
  readonly endpointUrl: string;

  constructor(
    private ssm: Pick<SSMClient, 'send'>,
    options: SsmSessionBrokerOptions
  ) {
    this.endpointUrl = options.endpoint ?? ssmEndpointUrl(options.region);
  }

  async startSession(
    descriptor: SessionDescriptor,
    signal?: AbortSignal
  ): Promise<SessionStartResponse> {
    const output = await this.ssm.send(
      new StartSessionCommand({
        Target: descriptor.Target,
        DocumentName: descriptor.DocumentName,
        Parameters: { portNumber: [...descriptor.Parameters.portNumber] },
      }),
      { abortSignal: signal }
    );

    const { SessionId, TokenValue, StreamUrl } = output;
    if (!SessionId || !TokenValue || !StreamUrl) {
      throw new SessionStartError(
        `StartSession on ${descriptor.Target} returned an incomplete response`,
        { target: descriptor.Target, session_id: SessionId }
      );
    }

    logger.debug(`[aws:ssm] Started session ${SessionId} on ${descriptor.Target}`);
    return { SessionId, TokenValue, StreamUrl };
  }

  async terminateSession(sessionId: string): Promise<void> {
    await this.ssm.send(new TerminateSessionCommand({ SessionId: sessionId }));
    logger.debug(`[aws:ssm] Terminated session ${sessionId}`);
  }
}
