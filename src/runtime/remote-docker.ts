import { Logger } from 'winston';
import { ContainerConfig } from '../config.js';
import { shellJoin, shellQuote, SshClient } from '../remote/ssh.js';
import { dockerRunArgs, NodeLaunch } from './container-spec.js';
import { ContainerRuntime } from './types.js';

export interface RemoteDockerConfig {
  host: string;
  ssh: SshClient;
  logger: Logger;
  commandTimeoutMs?: number;
}

export class RemoteCommandError extends Error {
  override readonly name = 'RemoteCommandError';

  constructor(readonly host: string, readonly exitCode: number, detail: string) {
    super(`${host}: ${detail || `exit ${exitCode}`}`);
  }
}

/**
 * A worker host's container runtime, driven through the docker CLI over ssh.
 */
export class RemoteDockerRuntime implements ContainerRuntime {
  readonly host: string;
  private config: RemoteDockerConfig;

  constructor(config: RemoteDockerConfig) {
    this.config = config;
    this.host = config.host;
  }

  private async docker(args: string[], signal?: AbortSignal) {
    return this.config.ssh.run(this.host, shellJoin(['docker', ...args]), {
      timeoutMs: this.config.commandTimeoutMs ?? 60000,
      signal,
    });
  }

  async isRunning(name: string, signal?: AbortSignal): Promise<boolean> {
    const result = await this.docker(
      ['ps', '--filter', `name=^/${name}$`, '--format', '{{.Names}}'],
      signal
    );
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(this.host, result.exitCode, result.stderr.trim());
    }
    return result.stdout.split('\n').some(line => line.trim() === name);
  }

  async launch(container: ContainerConfig, launch: NodeLaunch, signal?: AbortSignal): Promise<void> {
    const args = dockerRunArgs(container, launch);
    this.config.logger.debug('docker run', { host: this.host, command: args.map(shellQuote).join(' ') });
    const result = await this.docker(args, signal);
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(this.host, result.exitCode, result.stderr.trim());
    }
  }

  async stop(name: string, signal?: AbortSignal): Promise<boolean> {
    const result = await this.docker(['stop', name], signal);
    if (result.exitCode === 0) return true;
    if (/no such container/i.test(result.stderr)) return false;
    throw new RemoteCommandError(this.host, result.exitCode, result.stderr.trim());
  }
}
