import { Logger } from 'winston';
import { CommandResult, CommandRunner } from '../exec/command-runner.js';

export interface SshConfig {
  connectTimeoutSeconds: number;
  user?: string;
  batchMode: boolean;
}

export interface SshClientConfig {
  runner: CommandRunner;
  logger: Logger;
  ssh: SshConfig;
}

export interface RemoteRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Non-interactive remote execution over the system ssh binary.
 * Host keys are not checked; hosts are assumed to already trust each other.
 */
export class SshClient {
  private config: SshClientConfig;

  constructor(config: SshClientConfig) {
    this.config = config;
  }

  sshArgs(host: string, remoteCommand: string): string[] {
    const { ssh } = this.config;
    const args: string[] = [];
    if (ssh.batchMode) {
      args.push('-o', 'BatchMode=yes');
    }
    args.push(
      '-o', `ConnectTimeout=${ssh.connectTimeoutSeconds}`,
      '-o', 'StrictHostKeyChecking=no',
      ssh.user ? `${ssh.user}@${host}` : host,
      remoteCommand,
    );
    return args;
  }

  async run(host: string, remoteCommand: string, options: RemoteRunOptions = {}): Promise<CommandResult> {
    this.config.logger.debug('ssh', { host, command: remoteCommand });
    return this.config.runner.run('ssh', this.sshArgs(host, remoteCommand), options);
  }

  /**
   * Authenticated no-op. Bounded by the connect timeout plus a small margin.
   */
  async ping(host: string, signal?: AbortSignal): Promise<CommandResult> {
    const timeoutMs = (this.config.ssh.connectTimeoutSeconds + 2) * 1000;
    return this.run(host, 'true', { timeoutMs, signal });
  }
}

/**
 * POSIX single-quote escaping for one word of a remote command line.
 */
export function shellQuote(word: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(words: string[]): string {
  return words.map(shellQuote).join(' ');
}
