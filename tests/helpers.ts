import { vi } from 'vitest';
import type { Logger } from 'winston';
import type { ContainerConfig, LauncherConfig } from '../src/config.js';
import type { CommandResult, CommandRunner } from '../src/exec/command-runner.js';
import type { NodeLaunch } from '../src/runtime/container-spec.js';
import type { HeadRuntime, WorkloadStatus } from '../src/runtime/types.js';

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Logger;
}

export function ok(stdout = ''): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function fail(stderr: string, exitCode = 1): CommandResult {
  return { stdout: '', stderr, exitCode };
}

/**
 * Every method is a spy; `overrides` supply the implementations.
 */
export function createMockRunner(overrides: Partial<CommandRunner> = {}) {
  return {
    run: vi.fn<CommandRunner['run']>(overrides.run ?? (async () => ok())),
    interactive: vi.fn<CommandRunner['interactive']>(overrides.interactive ?? (async () => 0)),
    exists: vi.fn<CommandRunner['exists']>(overrides.exists ?? (async () => true)),
  };
}

export function testContainer(overrides: Partial<ContainerConfig> = {}): ContainerConfig {
  return {
    image: 'test-image',
    name: 'x',
    entrypoint: ['./run-cluster-node.sh'],
    env: { NCCL_DEBUG: 'INFO' },
    volumes: ['/data/cache:/root/.cache'],
    privileged: true,
    gpus: 'all',
    ipcHost: true,
    networkHost: true,
    autoRemove: true,
    ulimits: [],
    devices: [],
    extraRunArgs: [],
    workloadStatusCommand: ['ray', 'status'],
    ...overrides,
  };
}

export function testConfig(overrides: Partial<LauncherConfig> = {}): LauncherConfig {
  return {
    container: testContainer(),
    ssh: { connectTimeoutSeconds: 5, batchMode: true },
    discovery: {
      strategy: 'subnet-probe',
      sshPort: 22,
      probeTimeoutMs: 1000,
      maxConcurrentProbes: 256,
      browseTimeoutMs: 5000,
    },
    readiness: { intervalMs: 2000, maxAttempts: 30, graceMs: 5000 },
    logging: { level: 'info', format: 'simple' },
    docker: {},
    ...overrides,
  };
}

/**
 * In-memory container supervisor for one host.
 */
export class FakeRuntime implements HeadRuntime {
  running = new Set<string>();
  launches: NodeLaunch[] = [];
  stops: string[] = [];
  execs: string[] = [];
  failIsRunning: Error | null = null;
  failLaunch: Error | null = null;
  failStop: Error | null = null;
  workloadReadyAfter = 1;
  workloadCalls = 0;
  execExitCode = 0;
  execError: Error | null = null;
  followLogs = vi.fn(async (_name: string, _signal?: AbortSignal): Promise<void> => {});

  constructor(readonly host: string) {}

  async isRunning(name: string): Promise<boolean> {
    if (this.failIsRunning) throw this.failIsRunning;
    return this.running.has(name);
  }

  async launch(container: ContainerConfig, launch: NodeLaunch): Promise<void> {
    if (this.failLaunch) throw this.failLaunch;
    this.launches.push(launch);
    this.running.add(container.name);
  }

  async stop(name: string): Promise<boolean> {
    this.stops.push(name);
    if (this.failStop) throw this.failStop;
    return this.running.delete(name);
  }

  async workloadStatus(name: string): Promise<WorkloadStatus> {
    this.workloadCalls++;
    const ready = this.running.has(name) && this.workloadCalls >= this.workloadReadyAfter;
    return { ok: ready, output: ready ? 'Active: 2 nodes' : 'not ready' };
  }

  async execInteractive(_name: string, command: string): Promise<number> {
    this.execs.push(command);
    if (this.execError) throw this.execError;
    return this.execExitCode;
  }
}
