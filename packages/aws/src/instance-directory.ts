/**
 * EC2 instance directory
 *
 * Turns whatever the operator typed into a running instance id and its
 * availability zone. Lookup order:
 *   i-0123abcd           instance id
 *   10.0.0.5             private, then public IPv4 address
 *   ip-10-0-0-5.ec2...   private, then public DNS name
 *   asg:web              first instance of an auto scaling group
 *   team:backend         tag key:value
 *   anything else        Name tag
 */

import {
  DescribeInstancesCommand,
  type DescribeInstancesCommandOutput,
  type EC2Client,
  type Filter,
} from '@aws-sdk/client-ec2';
import {
  InstanceResolutionError,
  errorMessage,
  logger,
  type InstanceDirectory,
  type InstanceLocation,
} from '@ssh-gate/core';

const INSTANCE_ID_PATTERN = /^i-[0-9a-f]{8}(?:[0-9a-f]{9})?$/;
const IPV4_PATTERN = /^(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)$/;
const DNS_PATTERN = /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;
const ASG_PREFIX = 'asg:';

const RUNNING: Filter = { Name: 'instance-state-name', Values: ['running'] };

/**
 * Candidate filter sets for an identifier, tried in order
 */
export function lookupFilters(identifier: string): Filter[][] {
  if (INSTANCE_ID_PATTERN.test(identifier)) {
    return [[{ Name: 'instance-id', Values: [identifier] }]];
  }
  if (IPV4_PATTERN.test(identifier)) {
    return [
      [{ Name: 'private-ip-address', Values: [identifier] }],
      [{ Name: 'ip-address', Values: [identifier] }],
    ];
  }
  if (DNS_PATTERN.test(identifier)) {
    return [
      [{ Name: 'private-dns-name', Values: [identifier] }],
      [{ Name: 'dns-name', Values: [identifier] }],
    ];
  }
  if (identifier.startsWith(ASG_PREFIX) && identifier.length > ASG_PREFIX.length) {
    return [
      [{ Name: 'tag:aws:autoscaling:groupName', Values: [identifier.slice(ASG_PREFIX.length)] }],
    ];
  }
  const separator = identifier.indexOf(':');
  if (separator > 0 && separator < identifier.length - 1) {
    return [
      [
        {
          Name: `tag:${identifier.slice(0, separator)}`,
          Values: [identifier.slice(separator + 1)],
        },
      ],
    ];
  }
  return [[{ Name: 'tag:Name', Values: [identifier] }]];
}

export class Ec2InstanceDirectory implements InstanceDirectory {
  constructor(private ec2: Pick<EC2Client, 'send'>) {}

  async resolve(identifier: string): Promise<InstanceLocation> {
    const trimmed = identifier.trim();
    if (!trimmed) {
      throw new InstanceResolutionError('Instance identifier is empty');
    }

    for (const filters of lookupFilters(trimmed)) {
      const location = await this.findFirst([...filters, RUNNING], trimmed);
      if (location) {
        logger.debug(
          `[aws:ec2] Resolved ${trimmed} to ${location.instanceId} in ${location.availabilityZone}`
        );
        return location;
      }
    }

    throw new InstanceResolutionError(`No running instance found for ${trimmed}`, {
      identifier: trimmed,
    });
  }

  private async findFirst(
    filters: Filter[],
    identifier: string
  ): Promise<InstanceLocation | undefined> {
    let nextToken: string | undefined;
    do {
      let output: DescribeInstancesCommandOutput;
      try {
        output = await this.ec2.send(
          new DescribeInstancesCommand({ Filters: filters, NextToken: nextToken })
        );
      } catch (error) {
        throw new InstanceResolutionError(
          `Failed to look up ${identifier}: ${errorMessage(error)}`,
          { identifier }
        );
      }

      for (const reservation of output.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const availabilityZone = instance.Placement?.AvailabilityZone;
          if (instance.InstanceId && availabilityZone) {
            return { instanceId: instance.InstanceId, availabilityZone };
          }
        }
      }
      nextToken = output.NextToken;
    } while (nextToken);

    return undefined;
  }
}
