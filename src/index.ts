export * from './errors.js';
export * from './config.js';
export { createLogger } from './logger.js';
export { ProcessRunner } from './exec/command-runner.js';
export type { CommandRunner, CommandResult, RunOptions } from './exec/command-runner.js';
export { SshClient, shellQuote, shellJoin } from './remote/ssh.js';
export {
  InterfaceDiscovery,
  linkUpPairs,
  parsePairingTable,
  selectManagementInterface,
  localIpv4Addresses,
} from './discovery/interfaces.js';
export type { InterfacePair, DetectedInterfaces } from './discovery/interfaces.js';
export {
  PeerDiscovery,
  SubnetProbeScanner,
  ServiceAnnouncementScanner,
  TcpProber,
  createScanStrategy,
} from './discovery/peers.js';
export type { PeerScanStrategy, PortProber } from './discovery/peers.js';
export { hostAddresses, parseCidr, sortAddresses } from './discovery/subnet.js';
export { parseNodeList, resolveTopology } from './cluster/topology.js';
export type { Topology } from './cluster/topology.js';
export { resolveCluster } from './cluster/resolve.js';
export { checkConnectivity } from './cluster/preflight.js';
export { waitForReady } from './cluster/readiness.js';
export { LifecycleContext } from './cluster/lifecycle-context.js';
export { ClusterOrchestrator } from './cluster/orchestrator.js';
export type { StatusReport, StopReport, LifecycleAction } from './cluster/orchestrator.js';
export { LocalDockerRuntime } from './runtime/local-docker.js';
export { RemoteDockerRuntime } from './runtime/remote-docker.js';
export type { ContainerRuntime, HeadRuntime } from './runtime/types.js';
export { runCli, runLauncher } from './launcher.js';
export type { LauncherDeps } from './launcher.js';
