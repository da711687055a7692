import { describe, it, expect } from 'vitest';
import { shellJoin, shellQuote, SshClient } from '../src/remote/ssh.js';
import { createMockLogger, createMockRunner } from './helpers.js';

describe('SshClient', () => {
  it('adds batch mode, connect timeout and host-key options', () => {
    const client = new SshClient({
      runner: createMockRunner(),
      logger: createMockLogger(),
      ssh: { connectTimeoutSeconds: 5, batchMode: true },
    });

    expect(client.sshArgs('10.0.0.3', 'true')).toEqual([
      '-o', 'BatchMode=yes', '-o', 'ConnectTimeout=5', '-o', 'StrictHostKeyChecking=no', '10.0.0.3', 'true',
    ]);
  });

  it('targets the configured remote user', () => {
    const client = new SshClient({
      runner: createMockRunner(),
      logger: createMockLogger(),
      ssh: { connectTimeoutSeconds: 10, batchMode: false, user: 'op' },
    });

    expect(client.sshArgs('10.0.0.3', 'docker ps')).toEqual([
      '-o', 'ConnectTimeout=10', '-o', 'StrictHostKeyChecking=no', 'op@10.0.0.3', 'docker ps',
    ]);
  });

  it('runs the remote command through the command runner', async () => {
    const runner = createMockRunner();
    const client = new SshClient({ runner, logger: createMockLogger(), ssh: { connectTimeoutSeconds: 5, batchMode: false } });

    await client.run('10.0.0.4', 'uptime', { timeoutMs: 3000 });

    expect(runner.run).toHaveBeenCalledWith(
      'ssh',
      ['-o', 'ConnectTimeout=5', '-o', 'StrictHostKeyChecking=no', '10.0.0.4', 'uptime'],
      { timeoutMs: 3000 }
    );
  });
});

describe('shellQuote', () => {
  it('leaves plain words alone', () => {
    expect(shellQuote('/data/cache:/root/.cache')).toBe('/data/cache:/root/.cache');
    expect(shellQuote('NCCL_DEBUG=INFO')).toBe('NCCL_DEBUG=INFO');
  });

  it('single-quotes words with shell metacharacters', () => {
    expect(shellQuote('name=^/x$')).toBe(`'name=^/x$'`);
    expect(shellQuote('a b')).toBe(`'a b'`);
    expect(shellQuote('')).toBe(`''`);
  });

  it('escapes embedded single quotes', () => {
    expect(shellQuote(`it's`)).toBe(`'it'\\''s'`);
  });

  it('joins a command line', () => {
    expect(shellJoin(['docker', 'ps', '--format', '{{.Names}}'])).toBe(`docker ps --format '{{.Names}}'`);
  });
});
