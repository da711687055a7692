import { ContainerConfig } from '../config.js';
import { NodeLaunch } from './container-spec.js';

export interface WorkloadStatus {
  ok: boolean;
  output: string;
}

/**
 * One host's container supervisor, as seen by the orchestrator.
 * A container is identified by (host, name).
 */
export interface ContainerRuntime {
  readonly host: string;
  isRunning(name: string, signal?: AbortSignal): Promise<boolean>;
  launch(container: ContainerConfig, launch: NodeLaunch, signal?: AbortSignal): Promise<void>;
  /** Resolves false when there was nothing to stop. */
  stop(name: string, signal?: AbortSignal): Promise<boolean>;
}

/**
 * The head's runtime is local and additionally reaches into the container.
 */
export interface HeadRuntime extends ContainerRuntime {
  workloadStatus(name: string, command: string[]): Promise<WorkloadStatus>;
  followLogs(name: string, signal?: AbortSignal): Promise<void>;
  execInteractive(name: string, command: string, signal?: AbortSignal): Promise<number>;
}
