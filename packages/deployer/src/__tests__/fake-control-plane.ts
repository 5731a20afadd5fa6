import { Hono } from "hono";
import type { BootEvent, BootPhase, CreateTargetRequest, CreateWorkloadRequest } from "@shiftctl/shared";
import type { FetchLike } from "../api-client.js";
import { EventChannel } from "../boot/channel.js";
import type { BootEventSource } from "../boot/stream.js";

/**
 * In-process stand-in for the control-plane API, served by a Hono app and
 * handed to the clients as their `fetch`.
 */

export interface FakeTarget {
  id: string;
  instance_id: string;
  instance_port: number;
  target_group?: string;
}

export interface FakeService {
  id: string;
  name: string;
  type: string;
  targets: FakeTarget[];
}

export interface FakeInstance {
  id: string;
  name?: string;
  state: string;
  created_at: string;
  configuration: { container_image: string };
}

export interface FakeNetwork {
  id: string;
  name: string;
  ipv4_cidr: string;
  instances: Array<{ id: string; internal_ip: string }>;
}

export interface FailureRules {
  createInstance?: (name: string | null) => boolean;
  stopInstance?: (id: string) => boolean;
  createTarget?: (instanceId: string) => boolean;
  removeTarget?: (targetId: string) => boolean;
}

export function fakeId(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, "0")}`;
}

export class FakeControlPlane {
  services = new Map<string, FakeService>();
  instances = new Map<string, FakeInstance>();
  networks = new Map<string, FakeNetwork>();
  createdInstances: CreateWorkloadRequest[] = [];
  /** `METHOD path` of every request, in order. */
  calls: string[] = [];
  failures: FailureRules = {};
  authorization: Array<string | undefined> = [];

  private nextId = 1000;
  private app = new Hono();

  readonly fetch: FetchLike = async (input, init) => this.app.request(input, init);

  constructor() {
    this.app.use("*", async (c, next) => {
      this.calls.push(`${c.req.method} ${c.req.path}`);
      this.authorization.push(c.req.header("Authorization"));
      await next();
    });

    this.app.get("/services", (c) =>
      c.json({
        services: [...this.services.values()].map(({ id, name, type }) => ({ id, name, type })),
      }),
    );

    this.app.get("/service/:id", (c) => {
      const service = this.services.get(c.req.param("id"));
      if (!service) return c.json({ reason: "Service not found" }, 404);
      return c.json({ ...service, created_at: "2026-01-01T00:00:00Z" });
    });

    this.app.get("/instance/list", (c) => c.json({ instances: [...this.instances.values()] }));

    this.app.post("/instance", async (c) => {
      const body: CreateWorkloadRequest = await c.req.json();
      if (this.failures.createInstance?.(body.name)) {
        return c.json({ reason: "Out of capacity" }, 500);
      }
      const id = this.newId();
      this.createdInstances.push(body);
      this.instances.set(id, {
        id,
        name: body.name ?? undefined,
        state: "running",
        created_at: "2026-01-01T00:00:00",
        configuration: { container_image: body.configuration.container_image },
      });
      return c.json({ id });
    });

    this.app.delete("/instance/:id", (c) => {
      const id = c.req.param("id");
      const instance = this.instances.get(id);
      if (!instance) return c.json({ reason: "Instance not found" }, 404);
      if (this.failures.stopInstance?.(id)) {
        return c.json({ reason: "Instance is busy" }, 500);
      }
      instance.state = "stopped";
      return c.json({});
    });

    this.app.post("/service/:id/target", async (c) => {
      const service = this.services.get(c.req.param("id"));
      if (!service) return c.json({ reason: "Service not found" }, 404);
      const body: CreateTargetRequest = await c.req.json();
      if (this.failures.createTarget?.(body.instance_id)) {
        return c.json({ reason: "Target rejected" }, 409);
      }
      const id = this.newId();
      service.targets.push({
        id,
        instance_id: body.instance_id,
        instance_port: body.instance_port,
        target_group: body.group,
      });
      return c.json({ target_id: id });
    });

    this.app.delete("/service/:id/target/:targetId", (c) => {
      const service = this.services.get(c.req.param("id"));
      if (!service) return c.json({ reason: "Service not found" }, 404);
      const targetId = c.req.param("targetId");
      if (this.failures.removeTarget?.(targetId)) {
        return c.json({ reason: "Target is locked" }, 500);
      }
      service.targets = service.targets.filter((t) => t.id !== targetId);
      return c.json({});
    });

    this.app.get("/networks", (c) =>
      c.json({
        networks: [...this.networks.values()].map(({ id, name, ipv4_cidr }) => ({ id, name, ipv4_cidr })),
      }),
    );

    this.app.get("/network/:id", (c) => {
      const network = this.networks.get(c.req.param("id"));
      if (!network) return c.json({ reason: "Network not found" }, 404);
      return c.json(network);
    });
  }

  addService(id: string, name: string, targets: FakeTarget[] = []): FakeService {
    const service = { id, name, type: "http", targets };
    this.services.set(id, service);
    return service;
  }

  addInstance(id: string, name?: string, state = "running"): FakeInstance {
    const instance = {
      id,
      name,
      state,
      created_at: "2026-01-01T00:00:00",
      configuration: { container_image: "registry.example.com/app:v1" },
    };
    this.instances.set(id, instance);
    return instance;
  }

  addNetwork(network: FakeNetwork): void {
    this.networks.set(network.id, network);
  }

  /** Names of the instances created through the API, in creation order. */
  createdNames(): Array<string | null> {
    return this.createdInstances.map((req) => req.name);
  }

  idOfCreated(name: string): string | undefined {
    return [...this.instances.values()].find((i) => i.name === name)?.id;
  }

  private newId(): string {
    return fakeId(this.nextId++);
  }
}

export type BootScript = "healthy" | "crash-before-start" | "crash-after-start";

export function stateEvent(state: BootPhase): BootEvent {
  return { kind: "state", state, at: new Date(0) };
}

export function logEvent(text: string): BootEvent {
  return { kind: "log", source: "stdout", text, at: new Date(0) };
}

/**
 * Boot event source that replays a script per opened stream, in the order the
 * streams are opened.
 */
export class ScriptedBoots {
  opened: string[] = [];
  private scripts: BootScript[];
  private fallback: BootScript;

  constructor(scripts: BootScript[] = [], fallback: BootScript = "healthy") {
    this.scripts = scripts;
    this.fallback = fallback;
  }

  readonly source: BootEventSource = async (workloadId) => {
    const script = this.scripts[this.opened.length] ?? this.fallback;
    this.opened.push(workloadId);
    const channel = new EventChannel<BootEvent>();
    channel.push(stateEvent("pulling-image"));
    channel.push(logEvent("Pulling layers"));
    if (script === "crash-before-start") {
      channel.end();
      return channel;
    }
    channel.push(stateEvent("online"));
    channel.push(stateEvent("executing-container"));
    if (script === "crash-after-start") channel.end();
    return channel;
  };
}
