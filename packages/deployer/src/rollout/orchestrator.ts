import {
  bestEffort,
  createLogger,
  DecommissionError,
  DEFAULT_TARGET_GROUP,
  errorMessage,
  RegistrationError,
  ValidationError,
} from "@shiftctl/shared";
import type {
  LeaveBehind,
  ReplicaRef,
  RolloutRequest,
  RolloutResult,
  RolloutState,
  Service,
  ServiceDetail,
  Target,
  Workload,
} from "@shiftctl/shared";
import type { HealthCheckOptions } from "../boot/monitor.js";
import { parseNetworkSpec } from "../network.js";
import { resolveId } from "../resolve.js";
import type { CreateWorkloadParams } from "../workloads.js";
import { generateDeployHex, randomHex, workloadName, type HexSource } from "./generation.js";

const DEFAULT_HEALTH_WINDOW_MS = 1000;
const DEFAULT_STOP_TIMEOUT_MS = 5000;

export interface ServiceCatalog {
  list(): Promise<Service[]>;
  get(serviceId: string): Promise<ServiceDetail>;
}

export interface WorkloadLifecycle {
  list(): Promise<Workload[]>;
  verifyImageAndGetPullToken(image: string): Promise<string | null>;
  create(params: CreateWorkloadParams, pullToken: string | null): Promise<string>;
  stop(workloadId: string, timeoutMs: number): Promise<void>;
}

export interface TargetRegistry {
  create(serviceId: string, workloadId: string, port: number, group: string): Promise<string>;
  remove(serviceId: string, targetId: string): Promise<void>;
}

export interface HealthGate {
  waitUntilHealthy(workloadId: string, options: HealthCheckOptions): Promise<void>;
}

export interface RolloutOrchestratorOptions {
  services: ServiceCatalog;
  workloads: WorkloadLifecycle;
  targets: TargetRegistry;
  monitor: HealthGate;
  healthWindowMs?: number;
  stopTimeoutMs?: number;
  randomHex?: HexSource;
}

/**
 * Port for the new generation: the requested one, else the single port every
 * old target in the group forwards to.
 */
export function resolvePort(
  requested: number | undefined,
  oldTargets: readonly Target[],
  group: string,
): number {
  if (requested !== undefined) return requested;
  if (oldTargets.length === 0) {
    throw new ValidationError(
      `--port required when no existing targets exist for group '${group}'`,
    );
  }
  const ports = new Set(oldTargets.map((t) => t.port));
  const [port] = ports;
  if (ports.size !== 1 || port === undefined) {
    throw new ValidationError(
      `--port required: existing targets in group '${group}' have different ports (${[...ports].join(", ")})`,
    );
  }
  return port;
}

/**
 * RolloutOrchestrator replaces the instances behind one target group of a
 * service with instances running a new image.
 *
 * New replicas are created and health-checked one at a time, and only
 * registered as targets once all of them are healthy. Any failure up to and
 * including registration stops everything created by this rollout and leaves
 * the old generation untouched. Retiring the old generation afterwards is
 * best effort: its failures become warnings on an otherwise complete rollout.
 */
export class RolloutOrchestrator {
  private logger = createLogger("rollout");
  private services: ServiceCatalog;
  private workloads: WorkloadLifecycle;
  private targets: TargetRegistry;
  private monitor: HealthGate;
  private healthWindowMs: number;
  private stopTimeoutMs: number;
  private random: HexSource;

  constructor(options: RolloutOrchestratorOptions) {
    this.services = options.services;
    this.workloads = options.workloads;
    this.targets = options.targets;
    this.monitor = options.monitor;
    this.healthWindowMs = options.healthWindowMs ?? DEFAULT_HEALTH_WINDOW_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.random = options.randomHex ?? randomHex;
  }

  async rollout(request: RolloutRequest): Promise<RolloutResult> {
    const group = request.group ?? DEFAULT_TARGET_GROUP;
    const leaveBehind: LeaveBehind = request.leaveBehind ?? "none";
    const setState = (state: RolloutState, message: string, replica?: ReplicaRef) => {
      this.logger.info(message);
      request.onStateChange?.({ state, message, replica });
    };

    // Everything up to the image check is read-only.
    setState("RESOLVING", `Resolving service '${request.service}'`);
    const serviceId = resolveId(request.service, await this.services.list(), "service");
    const service = await this.services.get(serviceId);
    const oldTargets = service.targets.filter((t) => t.group === group);

    const replicas = request.replicas ?? Math.max(1, oldTargets.length);
    if (!Number.isInteger(replicas) || replicas < 1) {
      throw new ValidationError(`Replica count must be a positive integer, got ${replicas}`);
    }
    const port = resolvePort(request.port, oldTargets, group);
    if (request.network && replicas > 1 && parseNetworkSpec(request.network).ip) {
      throw new ValidationError(
        "An explicit network IP cannot be shared by several replicas; omit the IP to auto-allocate",
      );
    }

    const existingNames = (await this.workloads.list()).flatMap((w) => (w.name ? [w.name] : []));
    const generation = generateDeployHex(service.name, group, existingNames, this.random);

    setState("PROVISIONING", `[1/5] Verifying ${request.image}...`);
    let pullToken: string | null;
    try {
      pullToken = await this.workloads.verifyImageAndGetPullToken(request.image);
    } catch (err) {
      setState("ROLLED_BACK", `Image verification failed, nothing was created`);
      throw err;
    }

    // [2/5] One replica at a time; `created` only ever grows.
    const created: string[] = [];
    for (let index = 0; index < replicas; index++) {
      const name = workloadName(service.name, group, generation, index);
      const replica: ReplicaRef = { index, total: replicas, name };
      setState("PROVISIONING", `[2/5 ${index + 1}/${replicas}] Provisioning ${name}...`, replica);

      let workloadId: string;
      try {
        workloadId = await this.workloads.create(
          {
            image: request.image,
            vcpus: request.vcpus,
            memoryMb: request.memoryMb,
            args: request.args,
            env: request.env,
            name,
            network: request.network,
          },
          pullToken,
        );
      } catch (err) {
        await this.rollBack(created, setState, err);
        throw err;
      }
      created.push(workloadId);

      setState(
        "AWAITING_HEALTH",
        `[2/5 ${index + 1}/${replicas}] ${workloadId.slice(0, 8)} starting...`,
        { ...replica, workloadId },
      );
      try {
        await this.monitor.waitUntilHealthy(workloadId, {
          healthWindowMs: this.healthWindowMs,
          onProgress: request.onBootProgress,
        });
      } catch (err) {
        await this.rollBack(created, setState, err);
        throw err;
      }
    }

    setState(
      "REGISTERING_TARGETS",
      `[3/5] Adding ${replicas} target(s) to service (group: ${group})...`,
    );
    const targetIds: string[] = [];
    for (const workloadId of created) {
      try {
        targetIds.push(await this.targets.create(serviceId, workloadId, port, group));
      } catch (err) {
        await bestEffort(
          targetIds,
          (targetId) => this.targets.remove(serviceId, targetId),
          ({ item, error }) =>
            this.logger.warn(`Failed to remove target ${item} during cleanup: ${errorMessage(error)}`),
        );
        await this.rollBack(created, setState, err);
        throw new RegistrationError(
          workloadId,
          `Failed to register instance ${workloadId} as a target of service '${service.name}': ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }

    const warnings: DecommissionError[] = [];
    let retiredTargets = 0;
    let stoppedWorkloads = 0;
    if (oldTargets.length > 0 && leaveBehind !== "targets") {
      setState("RETIRING", `[4/5] Deregistering ${oldTargets.length} old target(s)...`);
      const failures = await bestEffort(
        oldTargets,
        (target) => this.targets.remove(serviceId, target.id),
        ({ item, error }) => {
          const warning = new DecommissionError("target", item.id, error);
          this.logger.warn(warning.message);
          warnings.push(warning);
        },
      );
      retiredTargets = oldTargets.length - failures.length;

      if (leaveBehind === "none") {
        const oldWorkloads = [...new Set(oldTargets.map((t) => t.workloadId))];
        setState("RETIRING", `[5/5] Stopping ${oldWorkloads.length} old instance(s)...`);
        const stopFailures = await bestEffort(
          oldWorkloads,
          (workloadId) => this.workloads.stop(workloadId, this.stopTimeoutMs),
          ({ item, error }) => {
            const warning = new DecommissionError("workload", item, error);
            this.logger.warn(warning.message);
            warnings.push(warning);
          },
        );
        stoppedWorkloads = oldWorkloads.length - stopFailures.length;
      }
    }

    setState(
      "COMPLETE",
      `Rolled out ${replicas} replica(s) of group '${group}' on service '${service.name}'`,
    );
    return {
      serviceId,
      serviceName: service.name,
      group,
      port,
      generation,
      workloadIds: created,
      targetIds,
      retiredTargets,
      stoppedWorkloads,
      warnings: warnings.map((w) => w.message),
    };
  }

  // Stops every instance this attempt created. Never touches the old generation.
  private async rollBack(
    created: readonly string[],
    setState: (state: RolloutState, message: string) => void,
    cause: unknown,
  ): Promise<void> {
    this.logger.error(`Rollout failed: ${errorMessage(cause)}`);
    await bestEffort(
      created,
      (workloadId) => this.workloads.stop(workloadId, this.stopTimeoutMs),
      ({ item, error }) =>
        this.logger.warn(`Failed to stop instance ${item} during cleanup: ${errorMessage(error)}`),
    );
    setState("ROLLED_BACK", `Rolled back ${created.length} new instance(s)`);
  }
}
