import {
  createdWorkloadSchema,
  createLogger,
  errorMessage,
  ProvisionError,
  ShiftctlError,
  workloadListSchema,
} from "@shiftctl/shared";
import type { CreateWorkloadRequest, Workload } from "@shiftctl/shared";
import type { ControlPlaneClient } from "./api-client.js";
import type { NetworkDirectory } from "./network.js";

export interface ImageVerifier {
  verifyAndGetPullToken(image: string): Promise<string | null>;
}

export interface CreateWorkloadParams {
  image: string;
  vcpus: number;
  memoryMb: number;
  args?: string[];
  env?: Record<string, string>;
  name?: string;
  /** `[ip]@network` join spec. */
  network?: string;
}

export interface WorkloadClientOptions {
  client: ControlPlaneClient;
  registry: ImageVerifier;
  networks: NetworkDirectory;
  region?: string;
}

export class WorkloadClient {
  private logger = createLogger("workloads");
  private client: ControlPlaneClient;
  private registry: ImageVerifier;
  private networks: NetworkDirectory;
  private region: string;

  constructor(options: WorkloadClientOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.networks = options.networks;
    this.region = options.region ?? "dev";
  }

  list(): Promise<Workload[]> {
    return this.client.get("/instance/list", "list instances", workloadListSchema);
  }

  verifyImageAndGetPullToken(image: string): Promise<string | null> {
    return this.registry.verifyAndGetPullToken(image);
  }

  /** Create an instance and return its id. The image must already be verified. */
  async create(params: CreateWorkloadParams, pullToken: string | null): Promise<string> {
    const label = params.name ?? params.image;
    try {
      const payload: CreateWorkloadRequest = {
        region: this.region,
        vcpu_ratio: 1,
        vcpu_count: params.vcpus,
        memory_mb: params.memoryMb,
        name: params.name ?? null,
        configuration: {
          container_image: params.image,
          args: params.args && params.args.length > 0 ? params.args : null,
          env: params.env && Object.keys(params.env).length > 0 ? params.env : null,
          registry_token: pullToken,
        },
      };
      if (params.network) {
        payload.network = await this.networks.attach(params.network);
      }

      const { id } = await this.client.post(
        "/instance",
        "start instance",
        payload,
        createdWorkloadSchema,
      );
      this.logger.info(`Instance ${id.slice(0, 8)} (${label}) created`);
      return id;
    } catch (err) {
      // Resolution and validation failures of the network spec pass through.
      if (err instanceof ShiftctlError && err.code !== "API") throw err;
      const message = `Failed to create instance ${label}: ${errorMessage(err)}`;
      throw new ProvisionError(message, { cause: err });
    }
  }

  async stop(workloadId: string, timeoutMs: number): Promise<void> {
    await this.client.delete(
      `/instance/${encodeURIComponent(workloadId)}`,
      "stop instance",
      { timeout_ms: timeoutMs },
    );
    this.logger.info(`Stopped instance ${workloadId}`);
  }
}
