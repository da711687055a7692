import { Logger } from 'winston';
import { DetectedInterfaces, InterfaceDiscovery, localIpv4Addresses } from '../discovery/interfaces.js';
import { PeerDiscovery } from '../discovery/peers.js';
import { NoNodesError } from '../errors.js';
import { parseNodeList, resolveTopology, Topology } from './topology.js';

export interface ResolveOptions {
  nodes?: string;
  managementInterface?: string;
  dataPlaneDevices?: string;
  /** Launching actions and --check-config need both interface values. */
  requireInterfaces: boolean;
}

export interface ResolveDeps {
  logger: Logger;
  interfaces: InterfaceDiscovery;
  createPeerDiscovery: () => PeerDiscovery;
  signal?: AbortSignal;
}

export interface ResolvedCluster {
  interfaces: DetectedInterfaces | null;
  nodes: string[];
  discovered: boolean;
  topology: Topology;
}

/**
 * Interface discovery, then peer discovery when no node list was given, then
 * role resolution against this host's addresses.
 */
export async function resolveCluster(options: ResolveOptions, deps: ResolveDeps): Promise<ResolvedCluster> {
  const explicitNodes = options.nodes ? parseNodeList(options.nodes) : [];

  let interfaces: DetectedInterfaces | null = null;
  if (options.requireInterfaces || explicitNodes.length === 0) {
    interfaces = await deps.interfaces.detect({
      managementInterface: options.managementInterface,
      dataPlaneDevices: options.dataPlaneDevices,
    });
  }

  let nodes = explicitNodes;
  let discovered = false;
  if (nodes.length === 0 && interfaces) {
    const peers = await deps.createPeerDiscovery().discover(interfaces.managementInterface, deps.signal);
    nodes = peers.nodes;
    discovered = true;
  }

  if (nodes.length === 0) {
    throw new NoNodesError();
  }

  const topology = resolveTopology(nodes, localIpv4Addresses(deps.interfaces.interfaces()));
  deps.logger.debug('Resolved topology', { head: topology.head, workers: topology.workers, discovered });

  return { interfaces, nodes, discovered, topology };
}
