/**
 * Error taxonomy for the launcher.
 *
 * Every failure that ends an invocation is a ClusterLaunchError carrying a
 * `kind`, so the CLI can print it with context and exit non-zero. Stop-path
 * failures never surface as errors; they are logged by the orchestrator.
 */

export type ErrorKind =
  | 'configuration'
  | 'discovery'
  | 'topology'
  | 'connectivity'
  | 'conflict'
  | 'launch'
  | 'timeout';

export class ClusterLaunchError extends Error {
  override readonly name: string = 'ClusterLaunchError';
  override readonly cause: Error | undefined;

  constructor(readonly kind: ErrorKind, message: string, cause?: Error) {
    super(message);
    this.cause = cause;
  }
}

export class ConfigurationError extends ClusterLaunchError {
  override readonly name: string = 'ConfigurationError';

  constructor(message: string, cause?: Error) {
    super('configuration', message, cause);
  }
}

/**
 * A required scanning or pairing tool is not installed on this host.
 */
export class DiscoveryToolMissing extends ConfigurationError {
  override readonly name = 'DiscoveryToolMissing';

  constructor(readonly tool: string, purpose: string) {
    super(`${tool} not found. Cannot ${purpose}.`);
  }
}

export class NoNodesError extends ConfigurationError {
  override readonly name = 'NoNodesError';

  constructor() {
    super('Nodes argument (-n) is mandatory or could not be auto-detected.');
  }
}

export class DiscoveryFailure extends ClusterLaunchError {
  override readonly name: string = 'DiscoveryFailure';

  constructor(message: string) {
    super('discovery', message);
  }
}

export class NoActiveDataPlaneDevice extends DiscoveryFailure {
  override readonly name = 'NoActiveDataPlaneDevice';

  constructor() {
    super('No active IB interfaces found.');
  }
}

export class NoAddressedCandidate extends DiscoveryFailure {
  override readonly name = 'NoAddressedCandidate';

  constructor(readonly devices: string[]) {
    super(`No active IB-associated interfaces have IP addresses (checked: ${devices.join(', ')}).`);
  }
}

export class InterfaceHasNoAddress extends DiscoveryFailure {
  override readonly name = 'InterfaceHasNoAddress';

  constructor(readonly iface: string) {
    super(`Could not determine IP/CIDR for interface ${iface}`);
  }
}

export class TopologyError extends ClusterLaunchError {
  override readonly name: string = 'TopologyError';

  constructor(message: string) {
    super('topology', message);
  }
}

export class HeadNotLocal extends TopologyError {
  override readonly name = 'HeadNotLocal';

  constructor(readonly nodes: string[]) {
    super(
      `Could not determine Head IP. This command must be run on one of the nodes: ${nodes.join(', ')}`
    );
  }
}

export class AmbiguousHead extends TopologyError {
  override readonly name = 'AmbiguousHead';

  constructor(readonly matches: string[]) {
    super(
      `More than one node address is bound to this host (${matches.join(', ')}). List each host only once.`
    );
  }
}

export class WorkerUnreachable extends ClusterLaunchError {
  override readonly name = 'WorkerUnreachable';

  constructor(readonly host: string, cause?: Error) {
    super(
      'connectivity',
      `Passwordless SSH to ${host} failed. Ensure SSH keys are configured and the host is reachable.`,
      cause
    );
  }
}

export class AlreadyRunning extends ClusterLaunchError {
  override readonly name = 'AlreadyRunning';

  constructor(readonly hosts: string[], readonly containerName: string) {
    super(
      'conflict',
      `Container '${containerName}' is already running on ${hosts.join(', ')}. Stop it first or use a different name.`
    );
  }
}

export class WorkerLaunchFailed extends ClusterLaunchError {
  override readonly name = 'WorkerLaunchFailed';

  constructor(readonly host: string, cause?: Error) {
    super('launch', `Failed to start worker container on ${host}${cause ? `: ${cause.message}` : ''}`, cause);
  }
}

export class ClusterStartTimeout extends ClusterLaunchError {
  override readonly name = 'ClusterStartTimeout';

  constructor(readonly attempts: number, readonly intervalMs: number) {
    super(
      'timeout',
      `Timeout waiting for cluster to start (${attempts} attempts, ${intervalMs}ms apart).`
    );
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
