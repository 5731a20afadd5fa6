export { createDeployer, type Deployer, type DeployerOptions } from "./deployer.js";
export { ControlPlaneClient, type ControlPlaneClientOptions, type FetchLike } from "./api-client.js";
export { ConfigSession, type Session } from "./session.js";
export { resolveId, isUuid, type Identifiable } from "./resolve.js";
export { ServiceDirectory } from "./services.js";
export { TargetClient } from "./targets.js";
export { WorkloadClient, type CreateWorkloadParams, type ImageVerifier } from "./workloads.js";
export {
  NetworkDirectory,
  parseNetworkSpec,
  nextFreeIp,
  type NetworkJoinSpec,
  type NetworkAttachment,
} from "./network.js";
export { RegistryClient, parseWwwAuthenticate, type ImageManifest } from "./registry/client.js";
export {
  parseImageReference,
  formatImageReference,
  manifestReference,
  DOCKER_HUB,
  type ImageReference,
} from "./registry/reference.js";
export { EventChannel } from "./boot/channel.js";
export {
  BootStreamClient,
  parseBootFrame,
  toBootEvent,
  wsSocketFactory,
  type BootEventSource,
  type BootEventStream,
  type BootSocket,
  type BootSocketFactory,
} from "./boot/stream.js";
export { BootMonitor, type BootMonitorOptions, type HealthCheckOptions } from "./boot/monitor.js";
export {
  RolloutOrchestrator,
  resolvePort,
  type RolloutOrchestratorOptions,
  type ServiceCatalog,
  type WorkloadLifecycle,
  type TargetRegistry,
  type HealthGate,
} from "./rollout/orchestrator.js";
export { generateDeployHex, workloadName, randomHex, type HexSource } from "./rollout/generation.js";
