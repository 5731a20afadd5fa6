import { createLogger, errorMessage, HealthCheckError } from "@shiftctl/shared";
import type { BootEvent, BootPhase, BootProgress } from "@shiftctl/shared";
import type { BootEventSource, BootEventStream } from "./stream.js";

const DEFAULT_LOG_LINES = 5;

export interface HealthCheckOptions {
  /** How long the stream must stay open after the container starts. */
  healthWindowMs: number;
  onProgress?: (progress: BootProgress) => void;
}

export interface BootMonitorOptions {
  source: BootEventSource;
  /** Log lines kept for progress display and failure reports. */
  logLines?: number;
}

type Outcome =
  | { type: "event"; event: BootEvent | null }
  | { type: "error"; error: unknown }
  | { type: "deadline" };

/**
 * BootMonitor follows one instance's boot event stream and decides whether
 * it came up healthy.
 *
 * The instance is healthy once it reports `executing-container` and its
 * stream then stays open for the whole health window. The window is fixed:
 * events that arrive inside it do not extend it. The stream closing at any
 * point before that is a failure.
 */
export class BootMonitor {
  private logger = createLogger("boot-monitor");
  private source: BootEventSource;
  private logLines: number;

  constructor(options: BootMonitorOptions) {
    this.source = options.source;
    this.logLines = options.logLines ?? DEFAULT_LOG_LINES;
  }

  async waitUntilHealthy(workloadId: string, options: HealthCheckOptions): Promise<void> {
    const tracker = new ProgressTracker(workloadId, this.logLines, options.onProgress);

    let stream: BootEventStream;
    try {
      stream = await this.source(workloadId);
    } catch (err) {
      throw new HealthCheckError(
        workloadId,
        "booting",
        `Failed to open event stream for instance ${workloadId}: ${errorMessage(err)}`,
        [],
        { cause: err },
      );
    }

    try {
      await this.awaitRunning(stream, tracker);
      this.logger.debug(
        `Instance ${workloadId} is executing its container, confirming for ${options.healthWindowMs}ms`,
      );
      await this.confirmHealthy(stream, tracker, Date.now() + options.healthWindowMs);
      this.logger.debug(`Instance ${workloadId} is healthy`);
    } finally {
      stream.close();
    }
  }

  private async awaitRunning(stream: BootEventStream, tracker: ProgressTracker): Promise<void> {
    for (;;) {
      let event: BootEvent | null;
      try {
        event = await stream.next();
      } catch (err) {
        throw tracker.failure("booting", "closed before reaching running state", err);
      }
      if (event === null) {
        throw tracker.failure("booting", "closed before reaching running state");
      }
      tracker.record(event);
      if (event.kind === "state" && event.state === "executing-container") return;
    }
  }

  private async confirmHealthy(
    stream: BootEventStream,
    tracker: ProgressTracker,
    deadline: number,
  ): Promise<void> {
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return;

      const outcome = await raceDeadline(stream.next(), remaining);
      switch (outcome.type) {
        case "deadline":
          return;
        case "error":
          throw tracker.failure("health-check", "closed unexpectedly during health check", outcome.error);
        case "event":
          if (outcome.event === null) {
            throw tracker.failure("health-check", "closed unexpectedly during health check");
          }
          tracker.record(outcome.event);
      }
    }
  }
}

// First one to settle wins. The losing read is not cancelled; closing the
// stream settles it.
function raceDeadline(next: Promise<BootEvent | null>, ms: number): Promise<Outcome> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<Outcome>((resolve) => {
    timer = setTimeout(() => resolve({ type: "deadline" }), ms);
  });
  const read = next.then(
    (event): Outcome => ({ type: "event", event }),
    (error: unknown): Outcome => ({ type: "error", error }),
  );
  return Promise.race([read, deadline]).finally(() => clearTimeout(timer));
}

class ProgressTracker {
  private workloadId: string;
  private maxLines: number;
  private onProgress?: (progress: BootProgress) => void;
  private phase?: BootPhase;
  private logs: string[] = [];

  constructor(
    workloadId: string,
    maxLines: number,
    onProgress?: (progress: BootProgress) => void,
  ) {
    this.workloadId = workloadId;
    this.maxLines = maxLines;
    this.onProgress = onProgress;
  }

  record(event: BootEvent): void {
    if (event.kind === "state") {
      this.phase = event.state;
    } else if (this.maxLines > 0) {
      this.logs.push(event.text);
      if (this.logs.length > this.maxLines) this.logs.shift();
    }
    this.onProgress?.({
      workloadId: this.workloadId,
      phase: this.phase,
      recentLogs: [...this.logs],
      event,
    });
  }

  failure(phase: "booting" | "health-check", what: string, cause?: unknown): HealthCheckError {
    const detail = cause === undefined ? "" : `: ${errorMessage(cause)}`;
    return new HealthCheckError(
      this.workloadId,
      phase,
      `Instance ${this.workloadId} ${what}${detail}`,
      [...this.logs],
      cause === undefined ? undefined : { cause },
    );
  }
}
