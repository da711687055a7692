import * as os from 'os';
import { Logger } from 'winston';
import { CommandRunner } from '../exec/command-runner.js';
import {
  DiscoveryFailure,
  DiscoveryToolMissing,
  NoActiveDataPlaneDevice,
  NoAddressedCandidate,
} from '../errors.js';

export const PAIRING_TOOL = 'ibdev2netdev';

export type InterfaceTable = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export interface InterfacePair {
  dataPlaneDevice: string;
  controlPlaneDevice: string;
  hasAddress: boolean;
}

export interface InterfaceOverrides {
  managementInterface?: string;
  dataPlaneDevices?: string;
}

export interface DetectedInterfaces {
  managementInterface: string;
  /** Comma-joined, passed through to every node's entrypoint. */
  dataPlaneDevices: string;
  pairs: InterfacePair[];
}

export interface InterfaceDiscoveryConfig {
  runner: CommandRunner;
  logger: Logger;
  networkInterfaces?: () => InterfaceTable;
}

// "rocep1s0f1 port 1 ==> enp1s0f1np1 (Up)"
const PAIR_LINE = /^(\S+)\s+port\s+\d+\s+==>\s+(\S+)\s+\((\w+)\)/;

export interface PairingLine {
  dataPlaneDevice: string;
  controlPlaneDevice: string;
  up: boolean;
}

/**
 * Every pairing line, in output order. A device with several ports appears
 * once per port.
 */
export function parsePairingTable(output: string): PairingLine[] {
  const pairs: PairingLine[] = [];
  for (const line of output.split('\n')) {
    const match = PAIR_LINE.exec(line.trim());
    if (!match) continue;
    const [, dataPlaneDevice, controlPlaneDevice, state] = match;
    pairs.push({ dataPlaneDevice, controlPlaneDevice, up: state === 'Up' });
  }
  return pairs;
}

/**
 * Link-up lines only, keeping the first link-up port of each data-plane
 * device.
 */
export function linkUpPairs(lines: PairingLine[]): PairingLine[] {
  const seen = new Set<string>();
  return lines.filter(line => {
    if (!line.up || seen.has(line.dataPlaneDevice)) return false;
    seen.add(line.dataPlaneDevice);
    return true;
  });
}

/**
 * Picks the management interface from addressed candidates, in discovery
 * order: the first name without a capital "P", else the first candidate.
 *
 * This is a naming heuristic only. On common data-center NICs the
 * partitioned or virtual-function port names carry a "P" (enP2p1s0f1np1)
 * while the base port does not (enp1s0f1np1).
 */
export function selectManagementInterface(candidates: string[]): string | null {
  if (candidates.length === 0) return null;
  return candidates.find(name => !name.includes('P')) ?? candidates[0];
}

export function ipv4Info(table: InterfaceTable, iface: string): os.NetworkInterfaceInfo | null {
  const entries = table[iface] ?? [];
  return entries.find(e => e.family === 'IPv4') ?? null;
}

/**
 * IPv4 addresses bound to this host, loopback excluded.
 */
export function localIpv4Addresses(table: InterfaceTable): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(table)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        addresses.push(entry.address);
      }
    }
  }
  return addresses;
}

export class InterfaceDiscovery {
  private config: InterfaceDiscoveryConfig;
  private readInterfaces: () => InterfaceTable;

  constructor(config: InterfaceDiscoveryConfig) {
    this.config = config;
    this.readInterfaces = config.networkInterfaces ?? os.networkInterfaces;
  }

  interfaces(): InterfaceTable {
    return this.readInterfaces();
  }

  async ensurePairingTool(): Promise<void> {
    if (!(await this.config.runner.exists(PAIRING_TOOL))) {
      throw new DiscoveryToolMissing(PAIRING_TOOL, 'auto-detect interfaces');
    }
  }

  /**
   * Link-up data-plane devices with their paired control-plane device.
   */
  async listPairs(): Promise<InterfacePair[]> {
    const result = await this.config.runner.run(PAIRING_TOOL, [], { timeoutMs: 10000 });
    if (result.exitCode !== 0) {
      throw new DiscoveryFailure(`${PAIRING_TOOL} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }

    const table = this.readInterfaces();
    return linkUpPairs(parsePairingTable(result.stdout))
      .map(p => ({
        dataPlaneDevice: p.dataPlaneDevice,
        controlPlaneDevice: p.controlPlaneDevice,
        hasAddress: ipv4Info(table, p.controlPlaneDevice) !== null,
      }));
  }

  /**
   * Fills in whichever of the two values the operator did not supply.
   */
  async detect(overrides: InterfaceOverrides = {}): Promise<DetectedInterfaces> {
    const { managementInterface, dataPlaneDevices } = overrides;
    if (managementInterface && dataPlaneDevices) {
      return { managementInterface, dataPlaneDevices, pairs: [] };
    }

    await this.ensurePairingTool();
    this.config.logger.info('Auto-detecting interfaces...');

    const pairs = await this.listPairs();
    if (pairs.length === 0) {
      throw new NoActiveDataPlaneDevice();
    }

    let ibIf = dataPlaneDevices;
    if (!ibIf) {
      ibIf = pairs.map(p => p.dataPlaneDevice).join(',');
      this.config.logger.info('Detected data-plane devices', { ibIf });
    }

    let ethIf = managementInterface;
    if (!ethIf) {
      const candidates = pairs.filter(p => p.hasAddress).map(p => p.controlPlaneDevice);
      const selected = selectManagementInterface(candidates);
      if (!selected) {
        throw new NoAddressedCandidate(pairs.map(p => p.controlPlaneDevice));
      }
      ethIf = selected;
      this.config.logger.info('Detected management interface', { ethIf, candidates });
    }

    return { managementInterface: ethIf, dataPlaneDevices: ibIf, pairs };
  }
}
