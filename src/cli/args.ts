import { Command } from 'commander';
import { ConfigurationError } from '../errors.js';
import { LifecycleAction } from '../cluster/orchestrator.js';

export interface CliOptions {
  nodes?: string;
  image?: string;
  name?: string;
  ethIf?: string;
  ibIf?: string;
  checkConfig?: boolean;
  daemon?: boolean;
  reuseRunning?: boolean;
  discovery?: string;
  config?: string;
  verbose?: boolean;
}

export interface SplitCommandLine {
  optionArgs: string[];
  action: LifecycleAction;
  command: string[];
}

const ACTIONS: ReadonlySet<string> = new Set(['start', 'stop', 'status']);

export function buildProgram(): Command {
  return new Command()
    .name('cluster-launch')
    .description('Launch, inspect and tear down a multi-host container cluster')
    .version('0.1.0')
    .usage('[options] [start|stop|status|exec] [command...]')
    .option('-n, --nodes <ips>', 'Comma-separated node IPs (auto-detected if omitted)')
    .option('-t, --image <image>', 'Container image')
    .option('--name <name>', 'Container name shared by every node')
    .option('--eth-if <name>', 'Management interface (auto-detected if omitted)')
    .option('--ib-if <names>', 'Data-plane devices, comma-separated (auto-detected if omitted)')
    .option('--check-config', 'Run detection and SSH checks, print the configuration and exit')
    .option('-d, --daemon', 'Leave the cluster running in the background (start only)')
    .option('--reuse-running', 'exec: run in an already running cluster instead of failing')
    .option('--discovery <strategy>', 'Peer discovery: subnet-probe or service-announcement')
    .option('-c, --config <path>', 'Path to a YAML configuration file')
    .option('-v, --verbose', 'Enable debug logging')
    .addHelpText('after', `
Actions:
  start            Launch the cluster and tail the head's logs (default)
  stop             Stop the container on every node
  status           Show container state on every node
  exec <command>   Launch, run <command> inside the head container, then stop

Environment:
  CLUSTER_EXTRA_DOCKER_ARGS   Extra docker run flags, added to every container launch
`);
}

function takesValue(program: Command, token: string): boolean {
  if (token.includes('=')) return false;
  return program.options.some(o => (o.required || o.optional) && (o.short === token || o.long === token));
}

/**
 * Separates launcher options from the action and the exec command.
 *
 * Options may appear before or after start/stop/status. Everything after
 * `exec` is the command, verbatim. A positional that is not an action starts
 * an exec command as well.
 */
export function splitCommandLine(program: Command, args: string[]): SplitCommandLine {
  const optionArgs: string[] = [];
  let action: LifecycleAction = 'start';
  let command: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const token = args[i];

    if (token.startsWith('-') && token !== '-' && token !== '--') {
      optionArgs.push(token);
      if (takesValue(program, token) && i + 1 < args.length) {
        optionArgs.push(args[++i]);
      }
      continue;
    }

    if (ACTIONS.has(token)) {
      action = token === 'stop' ? 'stop' : token === 'status' ? 'status' : 'start';
      continue;
    }

    action = 'exec';
    command = token === 'exec' || token === '--' ? args.slice(i + 1) : args.slice(i);
    break;
  }

  if (action === 'exec' && command.length === 0) {
    throw new ConfigurationError('exec requires a command to run on the head node');
  }

  return { optionArgs, action, command };
}

/**
 * The command words are re-joined with spaces, then run by `bash -c`
 * inside the container.
 */
export function joinCommand(words: string[]): string {
  return words.join(' ');
}
