/**
 * @ssh-gate/aws
 *
 * AWS implementations of the ssh-gate capability interfaces.
 */

export { createAwsClients, destroyAwsClients, ssmEndpointUrl } from './clients.js';
export type { AwsClientOptions, AwsClients } from './clients.js';
export { Ec2InstanceDirectory, lookupFilters } from './instance-directory.js';
export { InstanceConnectTrustBroker } from './trust-broker.js';
export { SsmSessionBroker } from './session-broker.js';
export type { SsmSessionBrokerOptions } from './session-broker.js';
