import Docker from 'dockerode';
import { Readable } from 'stream';
import { Logger } from 'winston';
import { ContainerConfig } from '../config.js';
import { CommandRunner } from '../exec/command-runner.js';
import { createOptions, dockerRunArgs, NodeLaunch } from './container-spec.js';
import { HeadRuntime, WorkloadStatus } from './types.js';

export interface LocalDockerConfig {
  host: string;
  logger: Logger;
  runner: CommandRunner;
  docker?: Docker;
  socketPath?: string;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  isTty?: boolean;
}

function statusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Splits Docker's multiplexed stream framing (8-byte header: stream type,
 * three padding bytes, big-endian payload size). Incomplete trailing frames
 * are returned so the caller can prepend them to the next chunk.
 */
export function demuxFrames(data: Buffer, onFrame: (streamType: number, payload: Buffer) => void): Buffer {
  let offset = 0;
  while (offset + 8 <= data.length) {
    const streamType = data[offset];
    const size = data.readUInt32BE(offset + 4);
    if (offset + 8 + size > data.length) break;
    onFrame(streamType, data.subarray(offset + 8, offset + 8 + size));
    offset += 8 + size;
  }
  return data.subarray(offset);
}

/**
 * The head host's container runtime, reached through the Docker Engine API.
 */
export class LocalDockerRuntime implements HeadRuntime {
  readonly host: string;
  private config: LocalDockerConfig;
  private docker: Docker;

  constructor(config: LocalDockerConfig) {
    this.config = config;
    this.host = config.host;
    this.docker = config.docker
      ?? (config.socketPath ? new Docker({ socketPath: config.socketPath }) : new Docker());
  }

  async isRunning(name: string): Promise<boolean> {
    const containers = await this.docker.listContainers({
      filters: { name: [`^/${name}$`] },
    });
    return containers.some(c => c.Names.includes(`/${name}`));
  }

  async launch(container: ContainerConfig, launch: NodeLaunch, signal?: AbortSignal): Promise<void> {
    if (container.extraRunArgs.length > 0) {
      await this.runWithCli(container, launch, signal);
      return;
    }

    this.config.logger.debug('Creating container', { host: this.host, name: container.name, role: launch.role });
    const created = await this.docker.createContainer(createOptions(container, launch));
    await created.start();
    this.config.logger.info('Container started', { host: this.host, name: container.name, id: created.id.slice(0, 12) });
  }

  /**
   * Pass-through `docker run` flags have no Engine API mapping, so such
   * launches go through the docker CLI instead.
   */
  private async runWithCli(container: ContainerConfig, launch: NodeLaunch, signal?: AbortSignal): Promise<void> {
    this.config.logger.debug('Running container with the docker CLI', {
      host: this.host,
      name: container.name,
      role: launch.role,
      extraRunArgs: container.extraRunArgs,
    });
    const result = await this.config.runner.run('docker', dockerRunArgs(container, launch), { signal });
    if (result.exitCode !== 0) {
      throw new Error(`docker run failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }
    this.config.logger.info('Container started', { host: this.host, name: container.name, id: result.stdout.trim().slice(0, 12) });
  }

  async stop(name: string): Promise<boolean> {
    try {
      await this.docker.getContainer(name).stop();
      return true;
    } catch (error) {
      // 304: already stopped, 404: no such container
      const code = statusCode(error);
      if (code === 304 || code === 404) return false;
      throw error;
    }
  }

  async workloadStatus(name: string, command: string[]): Promise<WorkloadStatus> {
    try {
      const exec = await this.docker.getContainer(name).exec({
        Cmd: command,
        AttachStdout: true,
        AttachStderr: true,
      });
      const stream = await exec.start({});

      const chunks: Buffer[] = [];
      let pending: Buffer = Buffer.alloc(0);
      await new Promise<void>((resolve, reject) => {
        stream.on('data', (data: Buffer) => {
          pending = demuxFrames(Buffer.concat([pending, data]), (_, payload) => chunks.push(payload));
        });
        stream.on('end', () => resolve());
        stream.on('error', reject);
      });

      const info = await exec.inspect();
      return { ok: info.ExitCode === 0, output: Buffer.concat(chunks).toString('utf-8') };
    } catch (error) {
      return { ok: false, output: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Streams the container's output until it exits or `signal` aborts.
   */
  async followLogs(name: string, signal?: AbortSignal): Promise<void> {
    const out = this.config.stdout ?? process.stdout;
    const err = this.config.stderr ?? process.stderr;
    const stream = await this.docker.getContainer(name).logs({
      follow: true,
      stdout: true,
      stderr: true,
    });

    await new Promise<void>((resolve, reject) => {
      let pending: Buffer = Buffer.alloc(0);
      const onAbort = () => {
        if (stream instanceof Readable) stream.destroy();
        resolve();
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      stream.on('data', (data: Buffer) => {
        pending = demuxFrames(Buffer.concat([pending, data]), (streamType, payload) => {
          (streamType === 2 ? err : out).write(payload);
        });
      });
      stream.on('end', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      });
      stream.on('error', (error: Error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      });
    });
  }

  /**
   * Attaches the operator's terminal to a shell inside the container.
   */
  async execInteractive(name: string, command: string, signal?: AbortSignal): Promise<number> {
    const tty = this.config.isTty ?? Boolean(process.stdin.isTTY);
    return this.config.runner.interactive(
      'docker',
      ['exec', tty ? '-it' : '-i', name, 'bash', '-i', '-c', command],
      { signal }
    );
  }
}
