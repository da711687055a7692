import { AmbiguousHead, ConfigurationError, HeadNotLocal } from '../errors.js';
import { isIpv4 } from '../discovery/subnet.js';

export type NodeRole = 'head' | 'worker';

export interface Topology {
  head: string;
  workers: string[];
}

/**
 * Parses an operator-supplied node list. Order is kept; blanks and repeats
 * are dropped.
 */
export function parseNodeList(value: string): string[] {
  const nodes: string[] = [];
  for (const raw of value.split(',')) {
    const ip = raw.trim();
    if (!ip || nodes.includes(ip)) continue;
    if (!isIpv4(ip)) {
      throw new ConfigurationError(`Invalid node address "${ip}" in node list`);
    }
    nodes.push(ip);
  }
  return nodes;
}

/**
 * Splits the node set into the head (the entry bound to this host) and
 * the workers, keeping node-set order for the workers.
 */
export function resolveTopology(nodes: string[], localAddresses: Iterable<string>): Topology {
  const local = new Set(localAddresses);
  const matches = nodes.filter(ip => local.has(ip));

  if (matches.length === 0) {
    throw new HeadNotLocal(nodes);
  }
  if (matches.length > 1) {
    throw new AmbiguousHead(matches);
  }

  const head = matches[0];
  return {
    head,
    workers: nodes.filter(ip => ip !== head),
  };
}
