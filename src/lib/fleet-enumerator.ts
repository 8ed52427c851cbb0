/**
 * Fleet Enumerator
 * Lists running EC2 instances opted into monitoring by tag, and reads each
 * instance's monitoring configuration from the state store.
 */

import { DescribeInstancesCommand, EC2Client } from '@aws-sdk/client-ec2';
import type { InstanceConfig } from '@/types/monitoring';
import type { IStateStore } from '@/types/redis';
import { getStore } from '@/lib/redis-store';

export interface FleetEnumerator {
  /** Instance ids eligible for monitoring. Rejects when the fleet cannot be listed. */
  listInstanceIds(): Promise<string[]>;
  /** Stored configuration, or null when the instance has none */
  getInstanceConfig(instanceId: string): Promise<InstanceConfig | null>;
}

/**
 * Instances without a configuration record are monitored by default
 */
export function shouldMonitorInstance(config: InstanceConfig | null): boolean {
  if (!config) return true;
  if (config.monitoringEnabled === false) return false;
  if (config.quarantine) return false;
  return true;
}

export interface Ec2FleetOptions {
  client?: Pick<EC2Client, 'send'>;
  region?: string;
  tagKey: string;
  tagValues: string[];
  store?: IStateStore;
}

export class Ec2FleetEnumerator implements FleetEnumerator {
  private readonly client: Pick<EC2Client, 'send'>;
  private readonly tagKey: string;
  private readonly tagValues: string[];
  private readonly store: () => IStateStore;

  constructor(options: Ec2FleetOptions) {
    this.client = options.client ?? new EC2Client({ region: options.region });
    this.tagKey = options.tagKey;
    this.tagValues = options.tagValues;
    const injected = options.store;
    this.store = injected ? () => injected : getStore;
  }

  async listInstanceIds(): Promise<string[]> {
    const ids: string[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new DescribeInstancesCommand({
          Filters: [
            { Name: `tag:${this.tagKey}`, Values: this.tagValues },
            { Name: 'instance-state-name', Values: ['running'] },
          ],
          NextToken: nextToken,
        })
      );

      for (const reservation of response.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          if (instance.InstanceId) ids.push(instance.InstanceId);
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return ids;
  }

  async getInstanceConfig(instanceId: string): Promise<InstanceConfig | null> {
    return this.store().getInstanceConfig(instanceId);
  }
}
