import { Logger } from 'winston';
import { SshClient } from '../remote/ssh.js';
import { WorkerUnreachable } from '../errors.js';

export interface PreflightConfig {
  ssh: SshClient;
  logger: Logger;
}

export interface PreflightResult {
  host: string;
  ok: boolean;
  detail?: string;
}

/**
 * Confirms passwordless ssh works against every worker before anything is
 * mutated. All workers are checked; the first failure in worker order is
 * raised as WorkerUnreachable.
 */
export async function checkConnectivity(
  workers: string[],
  config: PreflightConfig,
  signal?: AbortSignal
): Promise<PreflightResult[]> {
  if (workers.length === 0) return [];

  config.logger.info('Checking SSH connectivity to worker nodes...', { workers });

  const results = await Promise.all(workers.map(async (host): Promise<PreflightResult> => {
    const result = await config.ssh.ping(host, signal);
    return result.exitCode === 0
      ? { host, ok: true }
      : { host, ok: false, detail: result.stderr.trim() || `exit ${result.exitCode}` };
  }));

  for (const result of results) {
    if (!result.ok) {
      config.logger.error('SSH preflight failed', { host: result.host, detail: result.detail });
      throw new WorkerUnreachable(result.host, new Error(result.detail));
    }
    config.logger.info(`SSH to ${result.host}: OK`);
  }

  return results;
}
