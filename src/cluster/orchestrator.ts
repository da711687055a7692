import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { LauncherConfig } from '../config.js';
import { DetectedInterfaces } from '../discovery/interfaces.js';
import { AlreadyRunning, toError, WorkerLaunchFailed, WorkerUnreachable } from '../errors.js';
import { NodeLaunch } from '../runtime/container-spec.js';
import { ContainerRuntime, HeadRuntime, WorkloadStatus } from '../runtime/types.js';
import { LifecycleContext } from './lifecycle-context.js';
import { waitForReady } from './readiness.js';
import { NodeRole, Topology } from './topology.js';

export type LifecycleAction = 'start' | 'stop' | 'status' | 'exec';

export interface OrchestratorConfig {
  logger: Logger;
  config: LauncherConfig;
  topology: Topology;
  head: HeadRuntime;
  workers: ContainerRuntime[];
  context: LifecycleContext;
}

export type StopOutcome = 'stopped' | 'not-running' | 'failed';

export interface StopReport {
  host: string;
  role: NodeRole;
  outcome: StopOutcome;
  error?: string;
}

export type WorkerState = 'running' | 'stopped' | 'unreachable';

export interface StatusReport {
  containerName: string;
  head: {
    host: string;
    running: boolean;
    workload?: WorkloadStatus;
    /** Set when the head could not be queried; `running` is then false. */
    error?: string;
  };
  workers: Array<{ host: string; state: WorkerState; error?: string }>;
}

export interface StartOptions {
  daemon: boolean;
}

export interface StartResult {
  daemon: boolean;
  readyAfterAttempts: number;
  interrupted: boolean;
}

export interface ExecOptions {
  reuseRunning: boolean;
}

export interface ExecResult {
  exitCode: number;
  reused: boolean;
  interrupted: boolean;
}

/**
 * Drives start, stop, status and exec across the resolved topology.
 *
 * Nothing is remembered between invocations: each action re-queries every
 * host. The running-container guard is check-then-act, so two operators
 * starting the same cluster at the same moment can race; there is no lock.
 *
 * Events: 'hostRunning' (host) from the guard, 'launched' (host, role),
 * 'stopped' (StopReport).
 */
export class ClusterOrchestrator extends EventEmitter {
  private config: OrchestratorConfig;

  constructor(config: OrchestratorConfig) {
    super();
    this.config = config;
    if (config.workers.length !== config.topology.workers.length) {
      throw new Error('One worker runtime is required per worker host');
    }
  }

  private get containerName(): string {
    return this.config.config.container.name;
  }

  private get signal(): AbortSignal {
    return this.config.context.signal;
  }

  /**
   * Hosts (head first, then workers in order) that already run a container
   * with the cluster's name.
   */
  async findRunning(): Promise<string[]> {
    const { head, workers, logger } = this.config;
    const name = this.containerName;

    const [headRunning, ...workerRunning] = await Promise.all([
      head.isRunning(name, this.signal),
      ...workers.map(w =>
        w.isRunning(name, this.signal).catch((error: unknown) => {
          throw new WorkerUnreachable(w.host, toError(error));
        })
      ),
    ]);

    const running: string[] = [];
    if (headRunning) running.push(head.host);
    workers.forEach((w, i) => {
      if (workerRunning[i]) running.push(w.host);
    });

    for (const host of running) {
      const role = host === head.host ? 'head' : 'worker';
      logger.warn(`Container '${name}' is already running on ${role} node (${host}).`);
      this.emit('hostRunning', host);
    }
    return running;
  }

  async start(interfaces: DetectedInterfaces, options: StartOptions): Promise<StartResult> {
    const { context, logger } = this.config;

    const running = await this.findRunning();
    if (running.length > 0) {
      throw new AlreadyRunning(running, this.containerName);
    }

    if (!options.daemon) {
      context.registerCleanup(() => this.stopQuietly());
    }

    try {
      await this.launchAll(interfaces);
      const attempts = await this.awaitReady();

      if (options.daemon) {
        logger.debug('Leaving cluster running', { daemon: true });
        return { daemon: true, readyAfterAttempts: attempts, interrupted: false };
      }

      logger.info('Cluster started. Tailing logs from head node; press Ctrl+C to stop the cluster.');
      await this.config.head.followLogs(this.containerName, this.signal);
      return { daemon: false, readyAfterAttempts: attempts, interrupted: context.interruptedBy !== null };
    } catch (error) {
      // Interrupted while waiting: cleanup below is the expected outcome
      if (context.interruptedBy !== null && !options.daemon) {
        return { daemon: false, readyAfterAttempts: 0, interrupted: true };
      }
      throw error;
    } finally {
      await context.runCleanup('exit');
    }
  }

  async exec(interfaces: DetectedInterfaces, command: string, options: ExecOptions): Promise<ExecResult> {
    const { context, logger, head } = this.config;

    const running = await this.findRunning();
    // Only a cluster whose head is up can be reused; a partial leftover is a conflict
    const reused = options.reuseRunning && running.includes(head.host);
    if (running.length > 0 && !reused) {
      if (options.reuseRunning) {
        logger.warn('Cannot reuse a cluster whose head is not running', { head: head.host, running });
      }
      throw new AlreadyRunning(running, this.containerName);
    }

    context.registerCleanup(() => this.stopQuietly());

    try {
      if (reused) {
        logger.info('Reusing running cluster', { hosts: running });
      } else {
        await this.launchAll(interfaces);
      }
      await this.awaitReady();

      logger.info(`Executing command on head node: ${command}`);
      const exitCode = await head.execInteractive(this.containerName, command, this.signal);
      return { exitCode, reused, interrupted: context.interruptedBy !== null };
    } catch (error) {
      if (context.interruptedBy !== null) {
        return { exitCode: 130, reused, interrupted: true };
      }
      throw error;
    } finally {
      await context.runCleanup('exit');
    }
  }

  /**
   * Best-effort teardown of every host. Never throws; per-host failures are
   * logged and reported.
   */
  async stop(): Promise<StopReport[]> {
    const { head, workers, logger } = this.config;
    const name = this.containerName;
    logger.info('Stopping cluster...');

    // No abort signal here: teardown must run to completion after an interrupt
    const stopOne = async (runtime: ContainerRuntime, role: NodeRole): Promise<StopReport> => {
      logger.info(`Stopping ${role} node (${runtime.host})...`);
      try {
        const stopped = await runtime.stop(name);
        return { host: runtime.host, role, outcome: stopped ? 'stopped' : 'not-running' };
      } catch (error) {
        const message = toError(error).message;
        logger.warn(`Failed to stop ${role} node (${runtime.host})`, { error: message });
        return { host: runtime.host, role, outcome: 'failed', error: message };
      }
    };

    const headReport = await stopOne(head, 'head');
    const workerReports = await Promise.all(workers.map(w => stopOne(w, 'worker')));
    const reports = [headReport, ...workerReports];

    for (const report of reports) {
      this.emit('stopped', report);
    }
    logger.info('Cluster stopped.');
    return reports;
  }

  async status(): Promise<StatusReport> {
    const { head, workers } = this.config;
    const name = this.containerName;

    const report: StatusReport = {
      containerName: name,
      head: { host: head.host, running: false },
      workers: [],
    };
    try {
      report.head.running = await head.isRunning(name, this.signal);
    } catch (error) {
      report.head.error = toError(error).message;
      this.config.logger.warn('Failed to query head container', { host: head.host, error: report.head.error });
    }
    if (report.head.running) {
      report.head.workload = await head.workloadStatus(name, this.config.config.container.workloadStatusCommand);
    }

    report.workers = await Promise.all(workers.map(async w => {
      try {
        const running = await w.isRunning(name, this.signal);
        return { host: w.host, state: running ? 'running' as const : 'stopped' as const };
      } catch (error) {
        return { host: w.host, state: 'unreachable' as const, error: toError(error).message };
      }
    }));

    return report;
  }

  private async stopQuietly(): Promise<void> {
    await this.stop();
  }

  private async awaitReady(): Promise<number> {
    const { config, logger, head } = this.config;
    return waitForReady({
      logger,
      intervalMs: config.readiness.intervalMs,
      maxAttempts: config.readiness.maxAttempts,
      graceMs: config.readiness.graceMs,
      probe: async () => (await head.workloadStatus(this.containerName, config.container.workloadStatusCommand)).ok,
    }, this.signal);
  }

  /**
   * Head first, then every worker. A failed worker launch rolls back the
   * whole cluster when no cleanup handler is going to.
   */
  private async launchAll(interfaces: DetectedInterfaces): Promise<void> {
    const { config, logger, topology, head, workers, context } = this.config;
    const base = {
      managementInterface: interfaces.managementInterface,
      dataPlaneDevices: interfaces.dataPlaneDevices,
    };

    logger.info(`Starting head node on ${topology.head}...`);
    const headLaunch: NodeLaunch = { ...base, role: 'head', hostIp: topology.head };
    await head.launch(config.container, headLaunch, this.signal);
    this.emit('launched', head.host, 'head');

    const results = await Promise.allSettled(workers.map(async w => {
      logger.info(`Starting worker node on ${w.host}...`);
      const launch: NodeLaunch = { ...base, role: 'node', hostIp: w.host, headIp: topology.head };
      await w.launch(config.container, launch, this.signal);
      this.emit('launched', w.host, 'worker');
    }));

    const failedIndex = results.findIndex(r => r.status === 'rejected');
    if (failedIndex === -1) return;

    const failed = results[failedIndex];
    const cause = failed.status === 'rejected' ? toError(failed.reason) : undefined;
    if (!context.hasCleanup) {
      await this.stop();
    }
    throw new WorkerLaunchFailed(workers[failedIndex].host, cause);
  }
}
