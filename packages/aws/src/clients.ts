/**
 * AWS client factory
 *
 * One set of SDK clients per (profile, region), credentials from the shared
 * config/credentials files.
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { EC2InstanceConnectClient } from '@aws-sdk/client-ec2-instance-connect';
import { SSMClient } from '@aws-sdk/client-ssm';
import { fromIni } from '@aws-sdk/credential-providers';
import { logger } from '@ssh-gate/core';

export interface AwsClientOptions {
  profile: string;
  region: string;
  /** Override for the SSM endpoint */
  ssmEndpoint?: string;
  /** SDK retry attempts (default: 3) */
  maxAttempts?: number;
}

export interface AwsClients {
  profile: string;
  region: string;
  ssm: SSMClient;
  ec2: EC2Client;
  instanceConnect: EC2InstanceConnectClient;
}

export function createAwsClients(options: AwsClientOptions): AwsClients {
  const clientConfig = {
    region: options.region,
    maxAttempts: options.maxAttempts ?? 3,
    credentials: fromIni({ profile: options.profile }),
  };

  logger.debug(`[aws] Creating clients for profile ${options.profile} in ${options.region}`);

  return {
    profile: options.profile,
    region: options.region,
    ssm: new SSMClient({ ...clientConfig, endpoint: options.ssmEndpoint }),
    ec2: new EC2Client(clientConfig),
    instanceConnect: new EC2InstanceConnectClient(clientConfig),
  };
}

/**
 * Regional SSM endpoint handed to session-manager-plugin
 */
export function ssmEndpointUrl(region: string): string {
  const suffix = region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
  return `https://ssm.${region}.${suffix}`;
}

/**
 * Close the clients' HTTP connection pools
 */
export function destroyAwsClients(clients: AwsClients): void {
  clients.ssm.destroy();
  clients.ec2.destroy();
  clients.instanceConnect.destroy();
}
