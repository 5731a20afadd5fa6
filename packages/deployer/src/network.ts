import { isIPv4 } from "node:net";
import {
  createLogger,
  networkDetailSchema,
  networkListSchema,
  ValidationError,
} from "@shiftctl/shared";
import type { Network, NetworkDetail } from "@shiftctl/shared";
import type { ControlPlaneClient } from "./api-client.js";
import { resolveId } from "./resolve.js";

export interface NetworkJoinSpec {
  /** Explicit address; allocated from the network's CIDR when absent. */
  ip?: string;
  network: string;
}

export interface NetworkAttachment {
  network_id: string;
  instance_ip: string;
}

/** Parse `[ip]@<network id or name>`, or a bare network id or name. */
export function parseNetworkSpec(spec: string): NetworkJoinSpec {
  const at = spec.indexOf("@");
  if (at === -1) {
    if (!spec) throw new ValidationError("Network must not be empty");
    return { network: spec };
  }

  const ip = spec.slice(0, at);
  const network = spec.slice(at + 1);
  if (!network || network.includes("@")) {
    throw new ValidationError(
      `Invalid network format: '${spec}'. Expected format: [ip]@<network_id/name>`,
    );
  }
  if (ip && !isIPv4(ip)) {
    throw new ValidationError(`Invalid IPv4 address '${ip}' in network spec '${spec}'`);
  }
  return ip ? { ip, network } : { network };
}

function ipToInt(ip: string): number {
  return ip.split(".").reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

function intToIp(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join(".");
}

/**
 * First free host address of `cidr`. The network address, the first host
 * (gateway) and the broadcast address are never handed out.
 */
export function nextFreeIp(cidr: string, used: readonly string[]): string {
  const [base, bitsText] = cidr.split("/");
  const bits = Number(bitsText);
  if (!base || !isIPv4(base) || !Number.isInteger(bits) || bits < 0 || bits > 32) {
    throw new ValidationError(`Invalid CIDR format: ${cidr}`);
  }

  const size = 2 ** (32 - bits);
  const network = ipToInt(base) - (ipToInt(base) % size);
  const taken = new Set(used.filter((ip) => isIPv4(ip)).map(ipToInt));

  for (let candidate = network + 2; candidate < network + size - 1; candidate++) {
    if (!taken.has(candidate)) return intToIp(candidate);
  }
  throw new ValidationError(`No free addresses left in network ${cidr}`);
}

export class NetworkDirectory {
  private logger = createLogger("networks");
  private client: ControlPlaneClient;

  constructor(client: ControlPlaneClient) {
    this.client = client;
  }

  list(): Promise<Network[]> {
    return this.client.get("/networks", "list networks", networkListSchema);
  }

  get(networkId: string): Promise<NetworkDetail> {
    return this.client.get(
      `/network/${encodeURIComponent(networkId)}`,
      "fetch network details",
      networkDetailSchema,
    );
  }

  /** Resolve a join spec to the network id and the address to claim in it. */
  async attach(spec: string): Promise<NetworkAttachment> {
    const join = parseNetworkSpec(spec);
    const networkId = resolveId(join.network, await this.list(), "network");
    if (join.ip) {
      return { network_id: networkId, instance_ip: join.ip };
    }

    const detail = await this.get(networkId);
    const ip = nextFreeIp(
      detail.ipv4Cidr,
      detail.members.map((m) => m.internalIp),
    );
    this.logger.debug(`Allocated ${ip} in network ${detail.name}`);
    return { network_id: networkId, instance_ip: ip };
  }
}
