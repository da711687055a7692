import chalk from 'chalk';
import { LauncherConfig } from '../config.js';
import { ResolvedCluster } from '../cluster/resolve.js';
import { LifecycleAction, StatusReport, StopReport } from '../cluster/orchestrator.js';

export type Printer = (line: string) => void;

const defaultPrinter: Printer = (line) => console.log(line);

export function printPlan(
  resolved: ResolvedCluster,
  containerName: string,
  action: LifecycleAction,
  print: Printer = defaultPrinter
): void {
  const { topology } = resolved;
  print(`${chalk.bold('Head Node:')} ${chalk.green(topology.head)}`);
  print(`${chalk.bold('Worker Nodes:')} ${topology.workers.length > 0 ? topology.workers.join(' ') : chalk.dim('(none)')}`);
  print(`${chalk.bold('Container Name:')} ${containerName}`);
  print(`${chalk.bold('Action:')} ${action}`);
}

export function printConfiguration(
  resolved: ResolvedCluster,
  config: LauncherConfig,
  print: Printer = defaultPrinter
): void {
  print(chalk.green('Configuration Check Complete.'));
  print(`  Image Name: ${config.container.image}`);
  print(`  ETH Interface: ${resolved.interfaces?.managementInterface ?? '-'}`);
  print(`  IB Interface: ${resolved.interfaces?.dataPlaneDevices ?? '-'}`);
  print(`  Nodes: ${resolved.nodes.join(',')}${resolved.discovered ? chalk.dim(' (discovered)') : ''}`);
  print(`  Discovery: ${config.discovery.strategy}`);
}

export function printStatus(report: StatusReport, print: Printer = defaultPrinter): void {
  const name = report.containerName;
  const { head } = report;

  if (head.running) {
    print(chalk.green(`[HEAD] ${head.host}: Container '${name}' is RUNNING.`));
    print('--- Ray Status ---');
    if (head.workload?.ok) {
      print(head.workload.output.trimEnd());
    } else {
      const detail = head.workload?.output.trim();
      print(chalk.red(`Failed to get ray status.${detail ? ` ${detail}` : ''}`));
    }
    print('------------------');
  } else {
    print(chalk.dim(`[HEAD] ${head.host}: Container '${name}' is NOT running.${head.error ? ` (${head.error})` : ''}`));
  }

  for (const worker of report.workers) {
    if (worker.state === 'running') {
      print(chalk.green(`[WORKER] ${worker.host}: Container '${name}' is RUNNING.`));
    } else if (worker.state === 'stopped') {
      print(chalk.dim(`[WORKER] ${worker.host}: Container '${name}' is NOT running.`));
    } else {
      print(chalk.yellow(`[WORKER] ${worker.host}: UNREACHABLE${worker.error ? ` (${worker.error})` : ''}`));
    }
  }
}

export function printStopReports(reports: StopReport[], print: Printer = defaultPrinter): void {
  for (const report of reports) {
    const label = `[${report.role.toUpperCase()}] ${report.host}:`;
    if (report.outcome === 'stopped') {
      print(`${label} ${chalk.green('stopped')}`);
    } else if (report.outcome === 'not-running') {
      print(`${label} ${chalk.dim('not running')}`);
    } else {
      print(`${label} ${chalk.yellow(`stop failed${report.error ? ` (${report.error})` : ''}`)}`);
    }
  }
}
