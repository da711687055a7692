import { execFile, spawn } from 'child_process';
import { Logger } from 'winston';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface InteractiveOptions {
  signal?: AbortSignal;
}

/**
 * Seam between the launcher and the processes it shells out to
 * (pairing tool, avahi-browse, ssh, the docker CLI).
 */
export interface CommandRunner {
  /** Runs to completion, capturing output. Never throws for a non-zero exit. */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** Runs attached to this process's terminal and resolves with the exit code. */
  interactive(command: string, args: string[], options?: InteractiveOptions): Promise<number>;
  exists(tool: string): Promise<boolean>;
}

export interface ProcessRunnerConfig {
  logger: Logger;
  defaultTimeoutMs?: number;
}

const MAX_BUFFER = 16 * 1024 * 1024;

export class ProcessRunner implements CommandRunner {
  private config: ProcessRunnerConfig;

  constructor(config: ProcessRunnerConfig) {
    this.config = config;
  }

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.config.defaultTimeoutMs ?? 0;
    this.config.logger.debug('Running command', { command, args, timeoutMs: timeout });

    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { encoding: 'utf-8', timeout, maxBuffer: MAX_BUFFER, signal: options.signal },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }
          if (error.name === 'AbortError') {
            reject(error);
            return;
          }

          let exitCode = -1;
          if (typeof error.code === 'number') {
            exitCode = error.code;
          } else if (error.code === 'ENOENT') {
            exitCode = 127;
          } else if (error.killed || error.signal) {
            // Timed out or killed
            exitCode = 124;
          }

          resolve({
            stdout: stdout ?? '',
            stderr: stderr || error.message,
            exitCode,
          });
        }
      );
    });
  }

  interactive(command: string, args: string[], options: InteractiveOptions = {}): Promise<number> {
    this.config.logger.debug('Running interactive command', { command, args });

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: 'inherit', signal: options.signal });

      proc.on('close', (code, signal) => {
        resolve(code ?? (signal ? 128 : -1));
      });

      proc.on('error', (error) => {
        reject(error);
      });
    });
  }

  async exists(tool: string): Promise<boolean> {
    const result = await this.run('sh', ['-c', `command -v ${tool}`], { timeoutMs: 5000 });
    return result.exitCode === 0 && result.stdout.trim().length > 0;
  }
}
