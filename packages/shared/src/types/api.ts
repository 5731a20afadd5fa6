import { z } from "zod";

// Wire shapes of the control-plane API. Every response body is parsed through
// one of these before it reaches the rest of the code.

export const DEFAULT_TARGET_GROUP = "default";

export interface Service {
  id: string;
  name: string;
  type: string;
}

export interface Target {
  id: string;
  workloadId: string;
  port: number;
  group: string;
}

export interface ServiceDetail extends Service {
  targets: Target[];
}

export type WorkloadState = "running" | "stopped" | "other";

export interface Workload {
  id: string;
  name?: string;
  state: WorkloadState;
  /** The state string exactly as the API reported it. */
  rawState: string;
  image?: string;
  createdAt: string;
}

export interface Network {
  id: string;
  name: string;
  ipv4Cidr: string;
}

export interface NetworkMember {
  id: string;
  internalIp: string;
}

export interface NetworkDetail extends Network {
  members: NetworkMember[];
}

const RUNNING_STATES = new Set(["running", "active"]);
const STOPPED_STATES = new Set(["stopped", "terminated", "failed"]);

export function parseWorkloadState(raw: string): WorkloadState {
  const normalized = raw.toLowerCase();
  if (RUNNING_STATES.has(normalized)) return "running";
  if (STOPPED_STATES.has(normalized)) return "stopped";
  return "other";
}

const serviceWire = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().nullish(),
});

export const serviceListSchema = z
  .object({ services: z.array(serviceWire) })
  .transform((body): Service[] =>
    body.services.map((s) => ({ id: s.id, name: s.name, type: s.type ?? "unknown" })),
  );

const targetWire = z.object({
  id: z.string(),
  instance_id: z.string(),
  instance_port: z.number().int().min(1).max(65535),
  target_group: z.string().nullish(),
  created_at: z.string().optional(),
});

export const serviceDetailSchema = serviceWire
  .extend({ targets: z.array(targetWire).default([]) })
  .transform(
    (s): ServiceDetail => ({
      id: s.id,
      name: s.name,
      type: s.type ?? "unknown",
      targets: s.targets.map((t) => ({
        id: t.id,
        workloadId: t.instance_id,
        port: t.instance_port,
        group: t.target_group ?? DEFAULT_TARGET_GROUP,
      })),
    }),
  );

const workloadWire = z.object({
  id: z.string(),
  name: z.string().nullish(),
  state: z.string(),
  configuration: z
    .object({ container_image: z.string().nullish() })
    .passthrough()
    .nullish(),
  created_at: z.string(),
});

export const workloadListSchema = z
  .object({ instances: z.array(workloadWire) })
  .transform((body): Workload[] =>
    body.instances.map((w) => ({
      id: w.id,
      name: w.name ?? undefined,
      state: parseWorkloadState(w.state),
      rawState: w.state,
      image: w.configuration?.container_image ?? undefined,
      createdAt: w.created_at,
    })),
  );

export const createdWorkloadSchema = z.object({ id: z.string() });

export const createdTargetSchema = z
  .object({ target_id: z.string() })
  .transform((body) => body.target_id);

const networkWire = z.object({
  id: z.string(),
  name: z.string(),
  ipv4_cidr: z.string(),
});

export const networkListSchema = z
  .object({ networks: z.array(networkWire) })
  .transform((body): Network[] =>
    body.networks.map((n) => ({ id: n.id, name: n.name, ipv4Cidr: n.ipv4_cidr })),
  );

export const networkDetailSchema = networkWire
  .extend({
    instances: z.array(z.object({ id: z.string(), internal_ip: z.string() })).default([]),
  })
  .transform(
    (n): NetworkDetail => ({
      id: n.id,
      name: n.name,
      ipv4Cidr: n.ipv4_cidr,
      members: n.instances.map((m) => ({ id: m.id, internalIp: m.internal_ip })),
    }),
  );

export const errorBodySchema = z.object({ reason: z.string() });

// POST /instance
export interface CreateWorkloadRequest {
  region: string;
  vcpu_ratio: number;
  vcpu_count: number;
  memory_mb: number;
  name: string | null;
  configuration: {
    container_image: string;
    args: string[] | null;
    env: Record<string, string> | null;
    registry_token: string | null;
  };
  network?: {
    network_id: string;
    instance_ip: string;
  };
}

// POST /service/{id}/target
export interface CreateTargetRequest {
  instance_id: string;
  instance_port: number;
  group: string;
}

// Frames on /instance/{id}/logs/stream
export const bootFrameSchema = z.object({
  log_type: z.enum(["state", "system", "stdout", "stderr"]),
  timestamp_ms: z.number(),
  message: z.string().nullish(),
  state: z.enum(["online", "pulling_container_image", "executing_container"]).nullish(),
});

export type BootFrame = z.infer<typeof bootFrameSchema>;
