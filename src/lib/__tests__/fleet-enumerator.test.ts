/**
 * Unit tests for the EC2 fleet enumerator
 */

import { describe, it, expect, vi } from 'vitest';
import { DescribeInstancesCommand } from '@aws-sdk/client-ec2';
import { Ec2FleetEnumerator, shouldMonitorInstance } from '@/lib/fleet-enumerator';
import { InMemoryStateStore } from '@/lib/redis-store';
import type { InstanceConfig } from '@/types/monitoring';

function createConfig(overrides?: Partial<InstanceConfig>): InstanceConfig {
  return {
    instanceId: 'i-0test0000000007',
    monitoringEnabled: true,
    quarantine: false,
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('shouldMonitorInstance', () => {
  it('should monitor instances without configuration', () => {
    expect(shouldMonitorInstance(null)).toBe(true);
  });

  it('should monitor enabled, unquarantined instances', () => {
    expect(shouldMonitorInstance(createConfig())).toBe(true);
  });

  it('should skip disabled instances', () => {
    expect(shouldMonitorInstance(createConfig({ monitoringEnabled: false }))).toBe(false);
  });

  it('should skip quarantined instances', () => {
    expect(shouldMonitorInstance(createConfig({ quarantine: true }))).toBe(false);
  });
});

describe('Ec2FleetEnumerator', () => {
  it('should follow pagination and collect running instance ids', async () => {
    const send = vi.fn()
      .mockResolvedValueOnce({
        Reservations: [
          { Instances: [{ InstanceId: 'i-a' }, { InstanceId: 'i-b' }] },
          { Instances: [{}] },
        ],
        NextToken: 'page-2',
      })
      .mockResolvedValueOnce({
        Reservations: [{ Instances: [{ InstanceId: 'i-c' }] }],
      });
    const fleet = new Ec2FleetEnumerator({
      client: { send },
      tagKey: 'AutoRecovery',
      tagValues: ['enabled', 'true'],
      store: new InMemoryStateStore(),
    });

    const ids = await fleet.listInstanceIds();

    expect(ids).toEqual(['i-a', 'i-b', 'i-c']);
    expect(send).toHaveBeenCalledTimes(2);

    const first = send.mock.calls[0][0];
    expect(first).toBeInstanceOf(DescribeInstancesCommand);
    expect(first.input).toEqual({
      Filters: [
        { Name: 'tag:AutoRecovery', Values: ['enabled', 'true'] },
        { Name: 'instance-state-name', Values: ['running'] },
      ],
      NextToken: undefined,
    });
    expect(send.mock.calls[1][0].input.NextToken).toBe('page-2');
  });

  it('should return an empty list when nothing matches', async () => {
    const send = vi.fn().mockResolvedValue({ Reservations: [] });
    const fleet = new Ec2FleetEnumerator({
      client: { send },
      tagKey: 'AutoRecovery',
      tagValues: ['enabled'],
      store: new InMemoryStateStore(),
    });

    expect(await fleet.listInstanceIds()).toEqual([]);
  });

  it('should propagate EC2 errors', async () => {
    const send = vi.fn().mockRejectedValue(new Error('UnauthorizedOperation'));
    const fleet = new Ec2FleetEnumerator({
      client: { send },
      tagKey: 'AutoRecovery',
      tagValues: ['enabled'],
      store: new InMemoryStateStore(),
    });

    await expect(fleet.listInstanceIds()).rejects.toThrow('UnauthorizedOperation');
  });

  it('should read instance configuration from the store', async () => {
    const store = new InMemoryStateStore();
    await store.updateInstanceConfig('i-a', { quarantine: true });
    const fleet = new Ec2FleetEnumerator({
      client: { send: vi.fn() },
      tagKey: 'AutoRecovery',
      tagValues: ['enabled'],
      store,
    });

    expect((await fleet.getInstanceConfig('i-a'))?.quarantine).toBe(true);
    expect(await fleet.getInstanceConfig('i-b')).toBeNull();
  });
});
