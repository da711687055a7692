import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { CLEANUP_SIGNALS, InterruptedError, LifecycleContext } from '../src/cluster/lifecycle-context.js';
import { createMockLogger } from './helpers.js';

function setup() {
  const signals = new EventEmitter();
  const logger = createMockLogger();
  const context = new LifecycleContext({ logger, signals });
  return { signals, logger, context };
}

describe('LifecycleContext', () => {
  it('installs signal handlers only once cleanup is registered', () => {
    const { signals, context } = setup();
    expect(signals.listenerCount('SIGINT')).toBe(0);

    context.registerCleanup(async () => {});
    for (const sig of CLEANUP_SIGNALS) {
      expect(signals.listenerCount(sig)).toBe(1);
    }
    expect(context.hasCleanup).toBe(true);
  });

  it('refuses a second cleanup registration', () => {
    const { context } = setup();
    context.registerCleanup(async () => {});
    expect(() => context.registerCleanup(async () => {})).toThrow('Cleanup already registered');
  });

  it('runs cleanup once no matter how many triggers arrive', async () => {
    const { signals, context } = setup();
    const cleanup = vi.fn(async () => {});
    context.registerCleanup(cleanup);

    signals.emit('SIGINT', 'SIGINT');
    signals.emit('SIGTERM', 'SIGTERM');
    await context.runCleanup('exit');
    await context.runCleanup('exit');

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('aborts in-flight work on a signal and records which one', async () => {
    const { signals, context } = setup();
    const triggers: string[] = [];
    context.on('cleanup', (trigger: string) => triggers.push(trigger));
    context.registerCleanup(async () => {});

    signals.emit('SIGTERM', 'SIGTERM');
    await context.runCleanup('exit');

    expect(context.signal.aborted).toBe(true);
    expect(context.signal.reason).toBeInstanceOf(InterruptedError);
    expect(context.interruptedBy).toBe('SIGTERM');
    expect(triggers).toEqual(['SIGTERM']);
  });

  it('removes its handlers when cleanup starts', async () => {
    const { signals, context } = setup();
    context.registerCleanup(async () => {});
    await context.runCleanup('exit');

    for (const sig of CLEANUP_SIGNALS) {
      expect(signals.listenerCount(sig)).toBe(0);
    }
    expect(context.signal.aborted).toBe(false);
  });

  it('logs a failing cleanup instead of rejecting', async () => {
    const { context, logger } = setup();
    context.registerCleanup(async () => {
      throw new Error('docker unavailable');
    });

    await expect(context.runCleanup('exit')).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Cleanup failed', { error: 'docker unavailable' });
  });

  it('resolves immediately without a registered cleanup', async () => {
    const { context } = setup();
    await expect(context.runCleanup('exit')).resolves.toBeUndefined();
  });

  it('dispose detaches handlers without running cleanup', () => {
    const { signals, context } = setup();
    const cleanup = vi.fn(async () => {});
    context.registerCleanup(cleanup);

    context.dispose();
    expect(signals.listenerCount('SIGHUP')).toBe(0);
    expect(cleanup).not.toHaveBeenCalled();
  });
});
