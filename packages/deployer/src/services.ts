import { serviceDetailSchema, serviceListSchema } from "@shiftctl/shared";
import type { Service, ServiceDetail } from "@shiftctl/shared";
import type { ControlPlaneClient } from "./api-client.js";

export class ServiceDirectory {
  private client: ControlPlaneClient;

  constructor(client: ControlPlaneClient) {
    this.client = client;
  }

  list(): Promise<Service[]> {
    return this.client.get("/services", "list services", serviceListSchema);
  }

  get(serviceId: string): Promise<ServiceDetail> {
    return this.client.get(
      `/service/${encodeURIComponent(serviceId)}`,
      "fetch service info",
      serviceDetailSchema,
    );
  }
}
