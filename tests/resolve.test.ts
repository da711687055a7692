import { describe, it, expect, vi } from 'vitest';
import { resolveCluster } from '../src/cluster/resolve.js';
import { InterfaceDiscovery, InterfaceTable } from '../src/discovery/interfaces.js';
import { PeerDiscovery, PeerScanStrategy } from '../src/discovery/peers.js';
import { HeadNotLocal } from '../src/errors.js';
import { createMockLogger, createMockRunner, ok } from './helpers.js';

const table: InterfaceTable = {
  lo: [{ address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }],
  enp1s0f0np0: [{ address: '10.0.0.2', netmask: '255.255.255.0', family: 'IPv4', mac: '00:00:00:00:00:01', internal: false, cidr: '10.0.0.2/24' }],
};

function setup(found: string[] = []) {
  const logger = createMockLogger();
  const runner = createMockRunner({ run: async () => ok('rocep1s0f0 port 1 ==> enp1s0f0np0 (Up)\n') });
  const interfaces = new InterfaceDiscovery({ runner, logger, networkInterfaces: () => table });
  const strategy: PeerScanStrategy = {
    name: 'subnet-probe',
    ensureAvailable: async () => {},
    scan: vi.fn(async () => found),
  };
  const createPeerDiscovery = vi.fn(() => new PeerDiscovery({ logger, strategy, networkInterfaces: () => table }));
  return { runner, deps: { logger, interfaces, createPeerDiscovery } };
}

describe('resolveCluster', () => {
  it('uses the node list as given and skips interface detection when not launching', async () => {
    const { runner, deps } = setup();

    const resolved = await resolveCluster({ nodes: '10.0.0.3,10.0.0.2', requireInterfaces: false }, deps);

    expect(resolved).toEqual({
      interfaces: null,
      nodes: ['10.0.0.3', '10.0.0.2'],
      discovered: false,
      topology: { head: '10.0.0.2', workers: ['10.0.0.3'] },
    });
    expect(runner.exists).not.toHaveBeenCalled();
    expect(deps.createPeerDiscovery).not.toHaveBeenCalled();
  });

  it('detects interfaces for launching actions', async () => {
    const { deps } = setup();

    const resolved = await resolveCluster({ nodes: '10.0.0.2,10.0.0.3', requireInterfaces: true }, deps);

    expect(resolved.interfaces).toEqual({
      managementInterface: 'enp1s0f0np0',
      dataPlaneDevices: 'rocep1s0f0',
      pairs: [{ dataPlaneDevice: 'rocep1s0f0', controlPlaneDevice: 'enp1s0f0np0', hasAddress: true }],
    });
    expect(deps.createPeerDiscovery).not.toHaveBeenCalled();
  });

  it('discovers peers on the management interface when no nodes are given', async () => {
    const { deps } = setup(['10.0.0.4', '10.0.0.3']);

    const resolved = await resolveCluster({ requireInterfaces: false }, deps);

    expect(resolved.discovered).toBe(true);
    expect(resolved.nodes).toEqual(['10.0.0.2', '10.0.0.3', '10.0.0.4']);
    expect(resolved.topology).toEqual({ head: '10.0.0.2', workers: ['10.0.0.3', '10.0.0.4'] });
  });

  it('resolves a single-node cluster when no peer answers', async () => {
    const { deps } = setup([]);
    const resolved = await resolveCluster({ requireInterfaces: true }, deps);
    expect(resolved.topology).toEqual({ head: '10.0.0.2', workers: [] });
  });

  it('fails when this host is not in the node list', async () => {
    const { deps } = setup();
    await expect(resolveCluster({ nodes: '10.0.0.7,10.0.0.8', requireInterfaces: false }, deps))
      .rejects.toBeInstanceOf(HeadNotLocal);
  });
});
