import { setTimeout as sleep } from 'timers/promises';
import { Logger } from 'winston';
import { ClusterStartTimeout } from '../errors.js';

export interface ReadinessConfig {
  logger: Logger;
  intervalMs: number;
  maxAttempts: number;
  graceMs: number;
  /** Resolves true once the head's workload manager reports ready. */
  probe: () => Promise<boolean>;
  delay?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultDelay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}

/**
 * Polls until ready, then waits out the grace period so workers can finish
 * joining the head. Returns the attempt number that succeeded.
 */
export async function waitForReady(config: ReadinessConfig, signal?: AbortSignal): Promise<number> {
  const delay = config.delay ?? defaultDelay;
  config.logger.info('Waiting for cluster to be ready...', {
    maxAttempts: config.maxAttempts,
    intervalMs: config.intervalMs,
  });

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    signal?.throwIfAborted();
    if (await config.probe()) {
      config.logger.info('Cluster head is responsive.', { attempt });
      await delay(config.graceMs, signal);
      return attempt;
    }
    config.logger.debug('Cluster not ready yet', { attempt });
    await delay(config.intervalMs, signal);
  }

  throw new ClusterStartTimeout(config.maxAttempts, config.intervalMs);
}
