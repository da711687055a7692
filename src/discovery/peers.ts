import * as net from 'net';
import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { CommandRunner } from '../exec/command-runner.js';
import { DiscoveryFailure, DiscoveryToolMissing, InterfaceHasNoAddress } from '../errors.js';
import { DiscoveryStrategy, LauncherConfig } from '../config.js';
import { InterfaceTable, ipv4Info } from './interfaces.js';
import { hostAddresses, isIpv4, parseCidr, sortAddresses } from './subnet.js';

export const BROWSE_TOOL = 'avahi-browse';
export const SSH_SERVICE_TYPE = '_ssh._tcp';

/** Smallest prefix the subnet probe will enumerate. */
export const MIN_SCAN_PREFIX = 16;

export interface ScanContext {
  iface: string;
  localIp: string;
  cidr: string;
  signal?: AbortSignal;
}

export interface PeerScanStrategy {
  readonly name: DiscoveryStrategy;
  ensureAvailable(): Promise<void>;
  /** Addresses of other hosts; may contain duplicates or the local IP. */
  scan(context: ScanContext): Promise<string[]>;
}

export interface PortProber {
  probe(host: string, port: number, timeoutMs: number): Promise<boolean>;
}

export class TcpProber implements PortProber {
  probe(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.createConnection({ host, port });
      let settled = false;

      const finish = (accepted: boolean) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        resolve(accepted);
      };

      const timer = setTimeout(() => finish(false), timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('error', () => finish(false));
    });
  }
}

/**
 * Runs `task` over every item with at most `limit` in flight, and waits for
 * all of them. Stops scheduling new items once `signal` aborts.
 */
export async function runBounded<T, R>(
  items: T[],
  limit: number,
  task: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      signal?.throwIfAborted();
      const index = next++;
      results[index] = await task(items[index]);
    }
  };

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  signal?.throwIfAborted();
  return results;
}

export interface SubnetProbeConfig {
  logger: Logger;
  prober?: PortProber;
  port: number;
  timeoutMs: number;
  maxConcurrent: number;
}

/**
 * Probes the SSH port of every host address in the interface's subnet.
 */
export class SubnetProbeScanner implements PeerScanStrategy {
  readonly name = 'subnet-probe' as const;
  private config: SubnetProbeConfig;
  private prober: PortProber;

  constructor(config: SubnetProbeConfig) {
    this.config = config;
    this.prober = config.prober ?? new TcpProber();
  }

  // Sockets come with the runtime; nothing to install.
  async ensureAvailable(): Promise<void> {}

  async scan(context: ScanContext): Promise<string[]> {
    const network = parseCidr(context.cidr);
    if (!network) {
      throw new InterfaceHasNoAddress(context.iface);
    }
    if (network.prefix < MIN_SCAN_PREFIX) {
      throw new DiscoveryFailure(
        `Subnet ${context.cidr} is too large to scan (minimum prefix /${MIN_SCAN_PREFIX}); pass nodes with -n`
      );
    }

    const targets = hostAddresses(network).filter(ip => ip !== context.localIp);
    this.config.logger.info(`Scanning for SSH peers on ${context.cidr}...`, {
      targets: targets.length,
      port: this.config.port,
    });

    const accepted = await runBounded(
      targets,
      this.config.maxConcurrent,
      ip => this.prober.probe(ip, this.config.port, this.config.timeoutMs),
      context.signal
    );

    return targets.filter((_, i) => accepted[i]);
  }
}

export interface ServiceAnnouncementConfig {
  runner: CommandRunner;
  logger: Logger;
  browseTimeoutMs: number;
}

/**
 * Parses `avahi-browse -p -r` output, keeping resolved IPv4 records that
 * arrived on `iface`.
 *
 * Resolved records look like:
 *   =;eth0;IPv4;spark-02;_ssh._tcp;local;spark-02.local;10.0.0.2;22;
 */
export function parseBrowseOutput(output: string, iface: string): string[] {
  const addresses: string[] = [];
  for (const line of output.split('\n')) {
    const fields = line.trim().split(';');
    if (fields[0] !== '=' || fields.length < 9) continue;
    const [, recordIface, protocol, , type, , , address] = fields;
    if (recordIface !== iface || protocol !== 'IPv4' || type !== SSH_SERVICE_TYPE) continue;
    if (isIpv4(address)) addresses.push(address);
  }
  return addresses;
}

/**
 * Collects hosts announcing the SSH service over mDNS on the interface.
 */
export class ServiceAnnouncementScanner implements PeerScanStrategy {
  readonly name = 'service-announcement' as const;
  private config: ServiceAnnouncementConfig;

  constructor(config: ServiceAnnouncementConfig) {
    this.config = config;
  }

  async ensureAvailable(): Promise<void> {
    if (!(await this.config.runner.exists(BROWSE_TOOL))) {
      throw new DiscoveryToolMissing(BROWSE_TOOL, 'browse service announcements');
    }
  }

  async scan(context: ScanContext): Promise<string[]> {
    this.config.logger.info(`Browsing ${SSH_SERVICE_TYPE} announcements on ${context.iface}...`);
    const result = await this.config.runner.run(
      BROWSE_TOOL,
      ['--parsable', '--terminate', '--resolve', '--no-db-lookup', SSH_SERVICE_TYPE],
      { timeoutMs: this.config.browseTimeoutMs, signal: context.signal }
    );

    // A browse cut short by the timeout still yields what it resolved so far
    if (result.exitCode !== 0 && result.stdout.trim() === '') {
      throw new DiscoveryFailure(`${BROWSE_TOOL} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }
    return parseBrowseOutput(result.stdout, context.iface);
  }
}

export interface PeerDiscoveryConfig {
  logger: Logger;
  strategy: PeerScanStrategy;
  networkInterfaces: () => InterfaceTable;
}

export interface DiscoveredPeers {
  localIp: string;
  cidr: string;
  nodes: string[];
}

export class PeerDiscovery extends EventEmitter {
  private config: PeerDiscoveryConfig;

  constructor(config: PeerDiscoveryConfig) {
    super();
    this.config = config;
  }

  async discover(iface: string, signal?: AbortSignal): Promise<DiscoveredPeers> {
    await this.config.strategy.ensureAvailable();
    this.config.logger.info('Auto-detecting nodes...', { strategy: this.config.strategy.name });

    const info = ipv4Info(this.config.networkInterfaces(), iface);
    if (!info || !info.cidr) {
      throw new InterfaceHasNoAddress(iface);
    }

    const localIp = info.address;
    const cidr = info.cidr;
    this.config.logger.info(`Detected local IP: ${localIp} (${cidr})`);

    const found = await this.config.strategy.scan({ iface, localIp, cidr, signal });
    const peers = sortAddresses(found.filter(ip => ip !== localIp));
    for (const ip of peers) {
      this.config.logger.info(`Found peer: ${ip}`);
      this.emit('peerFound', ip);
    }

    const nodes = sortAddresses([localIp, ...peers]);
    this.config.logger.info(`Cluster nodes: ${nodes.join(',')}`);
    return { localIp, cidr, nodes };
  }
}

export function createScanStrategy(
  discovery: LauncherConfig['discovery'],
  deps: { runner: CommandRunner; logger: Logger; prober?: PortProber }
): PeerScanStrategy {
  if (discovery.strategy === 'service-announcement') {
    return new ServiceAnnouncementScanner({
      runner: deps.runner,
      logger: deps.logger,
      browseTimeoutMs: discovery.browseTimeoutMs,
    });
  }
  return new SubnetProbeScanner({
    logger: deps.logger,
    prober: deps.prober,
    port: discovery.sshPort,
    timeoutMs: discovery.probeTimeoutMs,
    maxConcurrent: discovery.maxConcurrentProbes,
  });
}
