import type { Config } from "@shiftctl/shared";
import { ControlPlaneClient, type FetchLike } from "./api-client.js";
import { BootMonitor } from "./boot/monitor.js";
import { BootStreamClient, type BootSocketFactory } from "./boot/stream.js";
import { NetworkDirectory } from "./network.js";
import { RegistryClient } from "./registry/client.js";
import { RolloutOrchestrator } from "./rollout/orchestrator.js";
import { ServiceDirectory } from "./services.js";
import { ConfigSession, type Session } from "./session.js";
import { TargetClient } from "./targets.js";
import { WorkloadClient } from "./workloads.js";

export interface DeployerOptions {
  config: Config;
  session?: Session;
  fetch?: FetchLike;
  registryFetch?: FetchLike;
  socketFactory?: BootSocketFactory;
}

export interface Deployer {
  session: Session;
  client: ControlPlaneClient;
  services: ServiceDirectory;
  networks: NetworkDirectory;
  registry: RegistryClient;
  workloads: WorkloadClient;
  targets: TargetClient;
  bootStream: BootStreamClient;
  monitor: BootMonitor;
  orchestrator: RolloutOrchestrator;
}

/** Wires every client around one session. */
export function createDeployer(options: DeployerOptions): Deployer {
  const { config } = options;
  const session = options.session ?? new ConfigSession(config);
  const client = new ControlPlaneClient({
    apiHost: config.apiHost,
    session,
    fetch: options.fetch,
  });

  const services = new ServiceDirectory(client);
  const networks = new NetworkDirectory(client);
  const registry = new RegistryClient({ session, fetch: options.registryFetch });
  const workloads = new WorkloadClient({ client, registry, networks });
  const targets = new TargetClient(client);
  const bootStream = new BootStreamClient({ client, socketFactory: options.socketFactory });
  const monitor = new BootMonitor({ source: bootStream.source });
  const orchestrator = new RolloutOrchestrator({
    services,
    workloads,
    targets,
    monitor,
    healthWindowMs: config.rollout.healthWindowMs,
    stopTimeoutMs: config.rollout.stopTimeoutMs,
  });

  return {
    session,
    client,
    services,
    networks,
    registry,
    workloads,
    targets,
    bootStream,
    monitor,
    orchestrator,
  };
}
