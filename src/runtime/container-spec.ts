import type Docker from 'dockerode';
import { ContainerConfig, expandVolume } from '../config.js';
import { ConfigurationError } from '../errors.js';

export type LaunchRole = 'head' | 'node';

/**
 * Per-node arguments handed to the image's entrypoint.
 */
export interface NodeLaunch {
  role: LaunchRole;
  hostIp: string;
  managementInterface: string;
  dataPlaneDevices: string;
  headIp?: string;
}

export function entrypointCommand(container: ContainerConfig, launch: NodeLaunch): string[] {
  const cmd = [
    ...container.entrypoint,
    '--role', launch.role,
    '--host-ip', launch.hostIp,
    '--eth-if', launch.managementInterface,
    '--ib-if', launch.dataPlaneDevices,
  ];
  if (launch.headIp) {
    cmd.push('--head-ip', launch.headIp);
  }
  return cmd;
}

export function envList(container: ContainerConfig): string[] {
  return Object.entries(container.env).map(([k, v]) => `${k}=${v}`);
}

export function bindList(container: ContainerConfig, home?: string): string[] {
  return container.volumes.map(v => expandVolume(v, home));
}

/**
 * Argument vector for `docker run`: always used on remote workers, and on
 * the head when `extraRunArgs` holds flags the Engine API options below do
 * not carry.
 */
export function dockerRunArgs(container: ContainerConfig, launch: NodeLaunch, home?: string): string[] {
  const args = ['run', '-d'];
  if (container.privileged) args.push('--privileged');
  if (container.gpus) args.push('--gpus', container.gpus);
  if (container.autoRemove) args.push('--rm');
  if (container.ipcHost) args.push('--ipc=host');
  if (container.networkHost) args.push('--network', 'host');
  args.push('--name', container.name);
  if (container.shmSize) args.push('--shm-size', container.shmSize);
  for (const e of envList(container)) args.push('-e', e);
  for (const b of bindList(container, home)) args.push('-v', b);
  for (const u of container.ulimits) args.push('--ulimit', u);
  for (const d of container.devices) args.push('--device', d);
  args.push(...container.extraRunArgs);
  args.push(container.image, ...entrypointCommand(container, launch));
  return args;
}

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  b: 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
};

export function parseByteSize(value: string): number {
  const match = /^(\d+)([bkmg]?)$/i.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid size "${value}"`);
  }
  return Number(match[1]) * SIZE_UNITS[match[2].toLowerCase()];
}

export function parseUlimit(value: string): { Name: string; Soft: number; Hard: number } {
  const match = /^([a-z]+)=(-?\d+)(?::(-?\d+))?$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid ulimit "${value}" (expected name=soft[:hard])`);
  }
  const soft = Number(match[2]);
  return { Name: match[1], Soft: soft, Hard: match[3] !== undefined ? Number(match[3]) : soft };
}

export function parseDevice(value: string): { PathOnHost: string; PathInContainer: string; CgroupPermissions: string } {
  const [onHost, inContainer, permissions] = value.split(':');
  if (!onHost) {
    throw new ConfigurationError(`Invalid device "${value}"`);
  }
  return {
    PathOnHost: onHost,
    PathInContainer: inContainer || onHost,
    CgroupPermissions: permissions || 'rwm',
  };
}

export function gpuRequest(gpus: string): Docker.DeviceRequest {
  if (gpus === 'all') {
    return { Driver: '', Count: -1, Capabilities: [['gpu']] };
  }
  if (/^\d+$/.test(gpus)) {
    return { Driver: '', Count: Number(gpus), Capabilities: [['gpu']] };
  }
  const ids = gpus.replace(/^"?device=/, '').replace(/"$/, '');
  return { Driver: '', DeviceIDs: ids.split(','), Capabilities: [['gpu']] };
}

/**
 * Engine API equivalent of dockerRunArgs, used for the local head.
 * `extraRunArgs` has no counterpart here.
 */
export function createOptions(container: ContainerConfig, launch: NodeLaunch, home?: string): Docker.ContainerCreateOptions {
  const hostConfig: Docker.HostConfig = {
    Privileged: container.privileged,
    AutoRemove: container.autoRemove,
    Binds: bindList(container, home),
    Ulimits: container.ulimits.map(parseUlimit),
    Devices: container.devices.map(parseDevice),
  };
  if (container.ipcHost) hostConfig.IpcMode = 'host';
  if (container.networkHost) hostConfig.NetworkMode = 'host';
  if (container.gpus) hostConfig.DeviceRequests = [gpuRequest(container.gpus)];
  if (container.shmSize) hostConfig.ShmSize = parseByteSize(container.shmSize);

  return {
    name: container.name,
    Image: container.image,
    Cmd: entrypointCommand(container, launch),
    Env: envList(container),
    HostConfig: hostConfig,
  };
}
