import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ApiError,
  bestEffort,
  createLogger,
  DecommissionError,
  parseConfig,
  parseWorkloadState,
  serviceDetailSchema,
  setLogLevel,
  workloadListSchema,
} from "../index.js";

describe("ApiError", () => {
  it("prefers the reason from the error body", () => {
    expect(new ApiError("add target", 409, "Target rejected").message).toBe("add target: Target rejected");
  });

  it("falls back to the status and body", () => {
    expect(new ApiError("list services", 502, undefined, "bad gateway").message).toBe(
      "Failed to list services: HTTP 502: bad gateway",
    );
    expect(new ApiError("list services", 500).message).toBe("Failed to list services: HTTP 500");
  });

  it("reports 503 as temporary unavailability", () => {
    expect(new ApiError("start instance", 503, "Out of capacity").message).toBe(
      "Service temporarily unavailable: Out of capacity",
    );
    expect(new ApiError("start instance", 503).message).toBe("Service temporarily unavailable");
  });
});

describe("DecommissionError", () => {
  it("names the resource it failed to clean up", () => {
    const cause = new Error("busy");
    const target = new DecommissionError("target", "t-1", cause);
    const workload = new DecommissionError("workload", "w-1", cause);

    expect(target.message).toBe("Failed to remove old target t-1: busy");
    expect(workload.message).toBe("Failed to stop old instance w-1: busy");
    expect(workload.cause).toBe(cause);
    expect(workload.code).toBe("DECOMMISSION");
    expect(workload.name).toBe("DecommissionError");
  });
});

describe("bestEffort", () => {
  it("runs every item and collects the failures", async () => {
    const seen: number[] = [];
    const onFailure = vi.fn();

    const failures = await bestEffort(
      [1, 2, 3, 4],
      async (n) => {
        seen.push(n);
        if (n % 2 === 0) throw new Error(`no ${n}`);
      },
      onFailure,
    );

    expect(seen).toEqual([1, 2, 3, 4]);
    expect(failures.map((f) => f.item)).toEqual([2, 4]);
    expect(onFailure).toHaveBeenCalledTimes(2);
  });
});

describe("wire schemas", () => {
  it("normalises workload states and keeps the raw one", () => {
    expect(parseWorkloadState("Running")).toBe("running");
    expect(parseWorkloadState("active")).toBe("running");
    expect(parseWorkloadState("terminated")).toBe("stopped");
    expect(parseWorkloadState("pending")).toBe("other");

    const [workload] = workloadListSchema.parse({
      instances: [{ id: "w-1", state: "pending", created_at: "2026-01-01", configuration: null }],
    });
    expect(workload).toEqual({ id: "w-1", state: "other", rawState: "pending", createdAt: "2026-01-01" });
  });

  it("puts targets without a group into the default group", () => {
    const detail = serviceDetailSchema.parse({
      id: "s-1",
      name: "web",
      type: "http",
      targets: [{ id: "t-1", instance_id: "w-1", instance_port: 8080 }],
    });
    expect(detail.targets).toEqual([{ id: "t-1", workloadId: "w-1", port: 8080, group: "default" }]);
  });

  it("rejects a target port out of range", () => {
    expect(() =>
      serviceDetailSchema.parse({
        id: "s-1",
        name: "web",
        targets: [{ id: "t-1", instance_id: "w-1", instance_port: 70000 }],
      }),
    ).toThrow();
  });
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({ token: "test-token" })).toEqual({
      apiHost: "http://localhost:8080",
      token: "test-token",
      registries: {},
      logLevel: "info",
      rollout: { healthWindowMs: 1000, stopTimeoutMs: 5000 },
    });
  });
});

describe("createLogger", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("prefixes level and component and writes to stderr", () => {
    createLogger("rollout").warn("careful");

    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] \[rollout\] careful$/),
    );
  });

  it("drops messages below the current level", () => {
    const logger = createLogger("rollout");
    logger.debug("hidden");
    setLogLevel("debug");
    logger.debug("shown");

    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
