import { EventEmitter } from 'events';
import { Logger } from 'winston';

export const CLEANUP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export type CleanupTrigger = NodeJS.Signals | 'exit';

/**
 * Minimal view of `process` used for signal registration.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface LifecycleContextConfig {
  logger: Logger;
  signals?: SignalSource;
}

export class InterruptedError extends Error {
  override readonly name = 'InterruptedError';

  constructor(readonly signal: NodeJS.Signals) {
    super(`Interrupted by ${signal}`);
  }
}

/**
 * Per-invocation cancellation and cleanup state.
 *
 * A cleanup routine is registered at most once. Once registered, the first
 * of SIGINT, SIGTERM, SIGHUP or an explicit `runCleanup('exit')` aborts
 * `signal` (signals only) and runs it; later triggers share that run. The
 * signal handlers are removed when cleanup starts, so a second Ctrl+C falls
 * back to the default behaviour and terminates the process.
 */
export class LifecycleContext extends EventEmitter {
  private config: LifecycleContextConfig;
  private controller = new AbortController();
  private cleanup: (() => Promise<void>) | null = null;
  private cleanupRun: Promise<void> | null = null;
  private interrupted: NodeJS.Signals | null = null;
  private listening = false;
  private signals: SignalSource;

  constructor(config: LifecycleContextConfig) {
    super();
    this.config = config;
    this.signals = config.signals ?? process;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get interruptedBy(): NodeJS.Signals | null {
    return this.interrupted;
  }

  get hasCleanup(): boolean {
    return this.cleanup !== null;
  }

  registerCleanup(cleanup: () => Promise<void>): void {
    if (this.cleanup) {
      throw new Error('Cleanup already registered for this invocation');
    }
    this.cleanup = cleanup;
    for (const sig of CLEANUP_SIGNALS) {
      this.signals.on(sig, this.onSignal);
    }
    this.listening = true;
  }

  /**
   * Runs the registered cleanup once. Resolves immediately when none is
   * registered.
   */
  runCleanup(trigger: CleanupTrigger): Promise<void> {
    if (this.cleanupRun) return this.cleanupRun;
    if (!this.cleanup) return Promise.resolve();

    this.removeSignalHandlers();
    const cleanup = this.cleanup;
    this.config.logger.debug('Running cleanup', { trigger });
    this.emit('cleanup', trigger);

    this.cleanupRun = cleanup().catch((error: unknown) => {
      this.config.logger.error('Cleanup failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return this.cleanupRun;
  }

  /**
   * Aborts in-flight work without running cleanup. Used for signals that
   * arrive when no cleanup is registered by a caller that still wants
   * cancellation.
   */
  abort(signal: NodeJS.Signals): void {
    if (!this.interrupted) {
      this.interrupted = signal;
      this.controller.abort(new InterruptedError(signal));
    }
  }

  dispose(): void {
    this.removeSignalHandlers();
  }

  private onSignal = (signal: NodeJS.Signals): void => {
    this.config.logger.warn(`Received ${signal}, stopping cluster...`);
    this.abort(signal);
    void this.runCleanup(signal);
  };

  private removeSignalHandlers(): void {
    if (!this.listening) return;
    for (const sig of CLEANUP_SIGNALS) {
      this.signals.off(sig, this.onSignal);
    }
    this.listening = false;
  }
}
