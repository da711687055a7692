import chalk from 'chalk';
import { CommanderError } from 'commander';
import { Logger } from 'winston';
import {
  applyOverrides,
  EXTRA_DOCKER_ARGS_ENV,
  loadConfig,
  LauncherConfig,
  mergeExtraDockerArgs,
} from './config.js';
import { createLogger } from './logger.js';
import { ClusterLaunchError } from './errors.js';
import { CommandRunner, ProcessRunner } from './exec/command-runner.js';
import { SshClient } from './remote/ssh.js';
import { InterfaceDiscovery, InterfaceTable } from './discovery/interfaces.js';
import { createScanStrategy, PeerDiscovery, PortProber } from './discovery/peers.js';
import { resolveCluster } from './cluster/resolve.js';
import { checkConnectivity } from './cluster/preflight.js';
import { LifecycleContext, SignalSource } from './cluster/lifecycle-context.js';
import { ClusterOrchestrator } from './cluster/orchestrator.js';
import { LocalDockerRuntime } from './runtime/local-docker.js';
import { RemoteDockerRuntime } from './runtime/remote-docker.js';
import { ContainerRuntime, HeadRuntime } from './runtime/types.js';
import { buildProgram, CliOptions, joinCommand, splitCommandLine } from './cli/args.js';
import { Printer, printConfiguration, printPlan, printStatus, printStopReports } from './cli/report.js';

/**
 * Collaborators a launcher run builds for itself unless they are supplied.
 */
export interface LauncherDeps {
  logger?: Logger;
  runner?: CommandRunner;
  prober?: PortProber;
  networkInterfaces?: () => InterfaceTable;
  signals?: SignalSource;
  createHead?: (host: string, config: LauncherConfig) => HeadRuntime;
  createWorker?: (host: string, ssh: SshClient) => ContainerRuntime;
  print?: Printer;
  printError?: Printer;
}

/**
 * Runs one invocation and resolves with the process exit code.
 * Launcher failures reject with a ClusterLaunchError.
 */
export async function runLauncher(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: LauncherDeps = {}
): Promise<number> {
  const program = buildProgram().exitOverride();
  const split = splitCommandLine(program, args);
  program.parse(split.optionArgs, { from: 'user' });
  const opts = program.opts<CliOptions>();

  const loaded = await loadConfig(opts.config);
  let config = applyOverrides(loaded.config, {
    image: opts.image,
    name: opts.name,
    discovery: opts.discovery,
    verbose: opts.verbose,
  });
  config = { ...config, container: mergeExtraDockerArgs(config.container, env[EXTRA_DOCKER_ARGS_ENV], env) };

  const logger = deps.logger ?? createLogger(config.logging);
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }

  const { action } = split;
  if (opts.daemon && action !== 'start') {
    logger.warn('Daemon mode (-d) only applies to the start action; ignoring');
  }

  const print = deps.print ?? ((line: string) => console.log(line));
  const runner = deps.runner ?? new ProcessRunner({ logger });
  const ssh = new SshClient({ runner, logger, ssh: config.ssh });
  const interfaces = new InterfaceDiscovery({ runner, logger, networkInterfaces: deps.networkInterfaces });
  const context = new LifecycleContext({ logger, signals: deps.signals });
  const launching = action === 'start' || action === 'exec';

  const createHead = deps.createHead ?? ((host: string) => new LocalDockerRuntime({
    host,
    logger,
    runner,
    socketPath: config.docker.socketPath,
  }));
  const createWorker = deps.createWorker ?? ((host: string) => new RemoteDockerRuntime({ host, ssh, logger }));

  try {
    const resolved = await resolveCluster({
      nodes: opts.nodes,
      managementInterface: opts.ethIf,
      dataPlaneDevices: opts.ibIf,
      requireInterfaces: launching || Boolean(opts.checkConfig),
    }, {
      logger,
      interfaces,
      createPeerDiscovery: () => new PeerDiscovery({
        logger,
        strategy: createScanStrategy(config.discovery, { runner, logger, prober: deps.prober }),
        networkInterfaces: () => interfaces.interfaces(),
      }),
      signal: context.signal,
    });

    const { topology } = resolved;
    printPlan(resolved, config.container.name, action, print);

    if (launching || opts.checkConfig) {
      await checkConnectivity(topology.workers, { ssh, logger }, context.signal);
    }

    if (opts.checkConfig) {
      printConfiguration(resolved, config, print);
      return 0;
    }

    const orchestrator = new ClusterOrchestrator({
      logger,
      config,
      topology,
      context,
      head: createHead(topology.head, config),
      workers: topology.workers.map(host => createWorker(host, ssh)),
    });

    switch (action) {
      case 'stop':
        printStopReports(await orchestrator.stop(), print);
        return 0;

      case 'status':
        printStatus(await orchestrator.status(), print);
        return 0;

      case 'exec': {
        if (!resolved.interfaces) throw new Error('Interfaces were not resolved for exec');
        const result = await orchestrator.exec(resolved.interfaces, joinCommand(split.command), {
          reuseRunning: Boolean(opts.reuseRunning),
        });
        return result.exitCode;
      }

      case 'start': {
        if (!resolved.interfaces) throw new Error('Interfaces were not resolved for start');
        const result = await orchestrator.start(resolved.interfaces, { daemon: Boolean(opts.daemon) });
        if (result.daemon) {
          print(chalk.green('Cluster started in background (daemon mode).'));
        }
        return 0;
      }
    }
  } finally {
    context.dispose();
  }
}

/**
 * Like runLauncher, with launcher and usage failures turned into exit codes.
 * Anything else still rejects.
 */
export async function runCli(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: LauncherDeps = {}
): Promise<number> {
  try {
    return await runLauncher(args, env, deps);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors were already printed by commander
      return error.exitCode;
    }
    if (error instanceof ClusterLaunchError) {
      const printError = deps.printError ?? ((line: string) => console.error(line));
      printError(chalk.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }
}
