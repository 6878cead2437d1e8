/**
 * EC2 Instance Connect trust broker
 *
 * SendSSHPublicKey authorizes the key for 60 seconds on the instance. There
 * is no revocation call; expiry is the only way a grant ends.
 */

import {
  SendSSHPublicKeyCommand,
  type EC2InstanceConnectClient,
} from '@aws-sdk/client-ec2-instance-connect';
import {
  logger,
  type PublicKeyGrantRequest,
  type PublicKeyGrantResult,
  type TrustBrokerClient,
} from '@ssh-gate/core';

export class InstanceConnectTrustBroker implements TrustBrokerClient {
  readonly id = 'ec2-instance-connect';

  constructor(private client: Pick<EC2InstanceConnectClient, 'send'>) {}

  async sendPublicKey(
    request: PublicKeyGrantRequest,
    signal?: AbortSignal
  ): Promise<PublicKeyGrantResult> {
    const command = new SendSSHPublicKeyCommand({
      InstanceId: request.instanceId,
      InstanceOSUser: request.osUser,
      SSHPublicKey: request.publicKey,
      AvailabilityZone: request.availabilityZone,
    });

    try {
      const output = await this.client.send(command, { abortSignal: signal });
      logger.debug(
        `[aws:eic] SendSSHPublicKey ${request.osUser}@${request.instanceId}: success=${output.Success} request=${output.RequestId}`
      );
      return {
        success: output.Success === true,
        requestId: output.RequestId,
        message: output.Success === true ? undefined : 'SendSSHPublicKey returned Success=false',
      };
    } catch (error) {
      if (signal?.aborted || !(error instanceof Error)) {
        throw error;
      }
      // Service exceptions carry the error code as their name
      return { success: false, errorCode: error.name, message: error.message };
    }
  }
}
