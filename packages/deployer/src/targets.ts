import { createdTargetSchema, createLogger } from "@shiftctl/shared";
import type { CreateTargetRequest } from "@shiftctl/shared";
import type { ControlPlaneClient } from "./api-client.js";

/**
 * Registers and deregisters workloads as routing targets of a service's
 * target group. Failures are surfaced unchanged; callers decide whether they
 * are fatal.
 */
export class TargetClient {
  private logger = createLogger("targets");
  private client: ControlPlaneClient;

  constructor(client: ControlPlaneClient) {
    this.client = client;
  }

  async create(
    serviceId: string,
    workloadId: string,
    port: number,
    group: string,
  ): Promise<string> {
    const body: CreateTargetRequest = {
      instance_id: workloadId,
      instance_port: port,
      group,
    };
    const targetId = await this.client.post(
      `/service/${encodeURIComponent(serviceId)}/target`,
      "add target",
      body,
      createdTargetSchema,
    );
    this.logger.debug(`Target ${targetId} -> ${workloadId}:${port} [${group}]`);
    return targetId;
  }

  async remove(serviceId: string, targetId: string): Promise<void> {
    await this.client.delete(
      `/service/${encodeURIComponent(serviceId)}/target/${encodeURIComponent(targetId)}`,
      "delete target",
    );
    this.logger.debug(`Target ${targetId} removed`);
  }
}
