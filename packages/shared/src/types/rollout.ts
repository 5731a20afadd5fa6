import type { BootProgress } from "./boot.js";

/** What to keep from the previous generation once the new one is registered. */
export type LeaveBehind = "none" | "instances" | "targets";

export type RolloutState =
  | "RESOLVING"
  | "PROVISIONING"
  | "AWAITING_HEALTH"
  | "REGISTERING_TARGETS"
  | "RETIRING"
  | "COMPLETE"
  | "ROLLED_BACK";

export interface ReplicaRef {
  index: number;
  total: number;
  name: string;
  workloadId?: string;
}

export interface RolloutStateChange {
  state: RolloutState;
  replica?: ReplicaRef;
  message: string;
}

export interface RolloutRequest {
  /** Service id, name, or id prefix. */
  service: string;
  image: string;
  group?: string;
  port?: number;
  replicas?: number;
  vcpus: number;
  memoryMb: number;
  env?: Record<string, string>;
  args?: string[];
  /** `[ip]@network` join spec. */
  network?: string;
  leaveBehind?: LeaveBehind;
  onStateChange?: (change: RolloutStateChange) => void;
  onBootProgress?: (progress: BootProgress) => void;
}

export interface RolloutResult {
  serviceId: string;
  serviceName: string;
  group: string;
  port: number;
  generation: string;
  workloadIds: string[];
  targetIds: string[];
  retiredTargets: number;
  stoppedWorkloads: number;
  warnings: string[];
}
