import * as fs from 'fs/promises';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, toError } from './errors.js';

export type DiscoveryStrategy = 'subnet-probe' | 'service-announcement';

export interface ContainerConfig {
  image: string;
  name: string;
  entrypoint: string[];
  env: Record<string, string>;
  volumes: string[];
  privileged: boolean;
  gpus: string;
  ipcHost: boolean;
  networkHost: boolean;
  autoRemove: boolean;
  shmSize?: string;
  ulimits: string[];
  devices: string[];
  /** Passed verbatim to `docker run`, just before the image. */
  extraRunArgs: string[];
  workloadStatusCommand: string[];
}

export interface LauncherConfig {
  container: ContainerConfig;
  ssh: {
    connectTimeoutSeconds: number;
    user?: string;
    batchMode: boolean;
  };
  discovery: {
    strategy: DiscoveryStrategy;
    sshPort: number;
    probeTimeoutMs: number;
    maxConcurrentProbes: number;
    browseTimeoutMs: number;
  };
  readiness: {
    intervalMs: number;
    maxAttempts: number;
    graceMs: number;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    file?: string;
  };
  docker: {
    socketPath?: string;
  };
}

export const EXTRA_DOCKER_ARGS_ENV = 'CLUSTER_EXTRA_DOCKER_ARGS';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../config/default.yaml', import.meta.url));

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) {
    throw new ConfigurationError(`Config section "${key}" must be a mapping`);
  }
  return value;
}

function str(obj: RawObject, key: string, where: string, fallback?: string): string {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new ConfigurationError(`Missing config value ${where}.${key}`);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigurationError(`Config value ${where}.${key} must be a string`);
  }
  return String(value);
}

function optStr(obj: RawObject, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return undefined;
  return str(obj, key, where);
}

function num(obj: RawObject, key: string, where: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Config value ${where}.${key} must be a non-negative number`);
  }
  return value;
}

function bool(obj: RawObject, key: string, where: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Config value ${where}.${key} must be true or false`);
  }
  return value;
}

function strList(obj: RawObject, key: string, where: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Config value ${where}.${key} must be a list`);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new ConfigurationError(`Config value ${where}.${key}[${i}] must be a string`);
    }
    return String(item);
  });
}

function strMap(obj: RawObject, key: string, where: string): Record<string, string> {
  const value = obj[key];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) {
    throw new ConfigurationError(`Config value ${where}.${key} must be a mapping`);
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== 'string' && typeof v !== 'number' && typeof v !== 'boolean') {
      throw new ConfigurationError(`Config value ${where}.${key}.${k} must be a scalar`);
    }
    out[k] = String(v);
  }
  return out;
}

function isStrategy(value: string): value is DiscoveryStrategy {
  return value === 'subnet-probe' || value === 'service-announcement';
}

export function parseStrategy(value: string): DiscoveryStrategy {
  if (!isStrategy(value)) {
    throw new ConfigurationError(
      `Unknown discovery strategy "${value}" (expected subnet-probe or service-announcement)`
    );
  }
  return value;
}

/**
 * Validates a parsed YAML document into a LauncherConfig.
 */
export function parseConfig(raw: unknown): LauncherConfig {
  if (!isObject(raw)) {
    throw new ConfigurationError('Configuration must be a YAML mapping');
  }

  const container = section(raw, 'container');
  const ssh = section(raw, 'ssh');
  const discovery = section(raw, 'discovery');
  const readiness = section(raw, 'readiness');
  const logging = section(raw, 'logging');
  const docker = section(raw, 'docker');

  const format = str(logging, 'format', 'logging', 'simple');
  if (format !== 'json' && format !== 'simple') {
    throw new ConfigurationError('Config value logging.format must be "json" or "simple"');
  }

  const entrypoint = strList(container, 'entrypoint', 'container');
  if (entrypoint.length === 0) {
    throw new ConfigurationError('Config value container.entrypoint must name the node entrypoint');
  }
  const statusCommand = strList(container, 'workloadStatusCommand', 'container');

  return {
    container: {
      image: str(container, 'image', 'container'),
      name: str(container, 'name', 'container'),
      entrypoint,
      env: strMap(container, 'env', 'container'),
      volumes: strList(container, 'volumes', 'container'),
      privileged: bool(container, 'privileged', 'container', true),
      gpus: str(container, 'gpus', 'container', 'all'),
      ipcHost: bool(container, 'ipcHost', 'container', true),
      networkHost: bool(container, 'networkHost', 'container', true),
      autoRemove: bool(container, 'autoRemove', 'container', true),
      shmSize: optStr(container, 'shmSize', 'container'),
      ulimits: strList(container, 'ulimits', 'container'),
      devices: strList(container, 'devices', 'container'),
      extraRunArgs: strList(container, 'extraRunArgs', 'container'),
      workloadStatusCommand: statusCommand.length > 0 ? statusCommand : ['ray', 'status'],
    },
    ssh: {
      connectTimeoutSeconds: num(ssh, 'connectTimeoutSeconds', 'ssh', 5),
      user: optStr(ssh, 'user', 'ssh'),
      batchMode: bool(ssh, 'batchMode', 'ssh', true),
    },
    discovery: {
      strategy: parseStrategy(str(discovery, 'strategy', 'discovery', 'subnet-probe')),
      sshPort: num(discovery, 'sshPort', 'discovery', 22),
      probeTimeoutMs: num(discovery, 'probeTimeoutMs', 'discovery', 1000),
      maxConcurrentProbes: Math.max(1, num(discovery, 'maxConcurrentProbes', 'discovery', 256)),
      browseTimeoutMs: num(discovery, 'browseTimeoutMs', 'discovery', 5000),
    },
    readiness: {
      intervalMs: num(readiness, 'intervalMs', 'readiness', 2000),
      maxAttempts: Math.max(1, num(readiness, 'maxAttempts', 'readiness', 30)),
      graceMs: num(readiness, 'graceMs', 'readiness', 5000),
    },
    logging: {
      level: str(logging, 'level', 'logging', 'info'),
      format,
      file: optStr(logging, 'file', 'logging'),
    },
    docker: {
      socketPath: optStr(docker, 'socketPath', 'docker'),
    },
  };
}

function deepMerge(base: RawObject, override: RawObject): RawObject {
  const out: RawObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isObject(existing) && isObject(value) ? deepMerge(existing, value) : value;
  }
  return out;
}

async function readYaml(file: string): Promise<unknown> {
  const content = await fs.readFile(file, 'utf-8');
  try {
    return parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${file}: ${toError(error).message}`, toError(error));
  }
}

export interface LoadedConfig {
  config: LauncherConfig;
  source: string;
  warnings: string[];
}

/**
 * Loads the packaged defaults, overlaid with the operator's file when given.
 * A user file that cannot be read falls back to the defaults with a warning.
 */
export async function loadConfig(userPath?: string, defaultPath: string = DEFAULT_CONFIG_PATH): Promise<LoadedConfig> {
  const warnings: string[] = [];
  const defaults = await readYaml(defaultPath);
  if (!isObject(defaults)) {
    throw new ConfigurationError(`Default configuration ${defaultPath} is not a mapping`);
  }

  if (!userPath) {
    return { config: parseConfig(defaults), source: defaultPath, warnings };
  }

  let user: unknown;
  try {
    user = await readYaml(userPath);
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    warnings.push(`Failed to load config from ${userPath}, using defaults`);
    return { config: parseConfig(defaults), source: defaultPath, warnings };
  }

  if (user === null || user === undefined) {
    return { config: parseConfig(defaults), source: userPath, warnings };
  }
  if (!isObject(user)) {
    throw new ConfigurationError(`Configuration ${userPath} must be a YAML mapping`);
  }
  return { config: parseConfig(deepMerge(defaults, user)), source: userPath, warnings };
}

export interface CliOverrides {
  image?: string;
  name?: string;
  discovery?: string;
  verbose?: boolean;
}

export function applyOverrides(config: LauncherConfig, overrides: CliOverrides): LauncherConfig {
  return {
    ...config,
    container: {
      ...config.container,
      image: overrides.image ?? config.container.image,
      name: overrides.name ?? config.container.name,
    },
    discovery: {
      ...config.discovery,
      strategy: overrides.discovery ? parseStrategy(overrides.discovery) : config.discovery.strategy,
    },
    logging: {
      ...config.logging,
      level: overrides.verbose ? 'debug' : config.logging.level,
    },
  };
}

/**
 * Splits a shell-like argument string on whitespace, honouring single and
 * double quotes and backslash escapes.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < input.length) {
        current += input[++i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === '\\' && i + 1 < input.length) {
      current += input[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new ConfigurationError(`Unterminated quote in "${input}"`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}

const MAPPED_FLAGS = new Set(['-e', '--env', '-v', '--volume', '--shm-size', '--ulimit', '--device']);

/**
 * Merges `docker run` flags from the operator's environment into the
 * container options. Flags with a container option of their own are mapped
 * onto it; every other token is kept, in order, in `extraRunArgs`.
 */
export function mergeExtraDockerArgs(
  container: ContainerConfig,
  extra: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): ContainerConfig {
  if (!extra || extra.trim() === '') return container;

  const merged: ContainerConfig = {
    ...container,
    env: { ...container.env },
    volumes: [...container.volumes],
    ulimits: [...container.ulimits],
    devices: [...container.devices],
    extraRunArgs: [...container.extraRunArgs],
  };

  const tokens = tokenize(extra);
  for (let i = 0; i < tokens.length; i++) {
    let flag = tokens[i];
    let value: string | undefined;

    const eq = flag.indexOf('=');
    const inline = flag.startsWith('--') && eq > 0;
    if (!MAPPED_FLAGS.has(inline ? flag.slice(0, eq) : flag)) {
      merged.extraRunArgs.push(flag);
      continue;
    }

    if (inline) {
      value = flag.slice(eq + 1);
      flag = flag.slice(0, eq);
    } else {
      value = tokens[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new ConfigurationError(`${EXTRA_DOCKER_ARGS_ENV}: flag ${flag} needs a value`);
    }

    switch (flag) {
      case '-e':
      case '--env': {
        const sep = value.indexOf('=');
        if (sep > 0) {
          merged.env[value.slice(0, sep)] = value.slice(sep + 1);
        } else {
          const fromHost = env[value];
          if (fromHost !== undefined) merged.env[value] = fromHost;
        }
        break;
      }
      case '-v':
      case '--volume':
        merged.volumes.push(value);
        break;
      case '--shm-size':
        merged.shmSize = value;
        break;
      case '--ulimit':
        merged.ulimits.push(value);
        break;
      case '--device':
        merged.devices.push(value);
        break;
    }
  }

  return merged;
}

/**
 * Expands a leading `~` or `$HOME` in the host side of a volume spec.
 * Expansion happens on the invoking host, including for remote workers.
 */
export function expandVolume(spec: string, home: string = os.homedir()): string {
  if (spec === '~' || spec.startsWith('~/') || spec.startsWith('~:')) {
    return home + spec.slice(1);
  }
  if (spec.startsWith('$HOME')) {
    return home + spec.slice('$HOME'.length);
  }
  return spec;
}
