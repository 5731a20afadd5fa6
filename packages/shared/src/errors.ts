export type ErrorCode =
  | "RESOLUTION"
  | "VALIDATION"
  | "PROVISION"
  | "HEALTH_CHECK"
  | "REGISTRATION"
  | "DECOMMISSION"
  | "API"
  | "AUTHENTICATION";

export type EntityKind = "service" | "workload" | "target" | "network" | "host";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ShiftctlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ResolutionFailure = "not-found" | "ambiguous";

/** A user-supplied identifier matched no resource, or more than one. */
export class ResolutionError extends ShiftctlError {
  readonly kind: EntityKind;
  readonly input: string;
  readonly reason: ResolutionFailure;
  readonly matches: number;

  constructor(
    kind: EntityKind,
    input: string,
    reason: ResolutionFailure,
    message: string,
    matches = 0,
  ) {
    super("RESOLUTION", message);
    this.kind = kind;
    this.input = input;
    this.reason = reason;
    this.matches = matches;
  }
}

export class ValidationError extends ShiftctlError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class ProvisionError extends ShiftctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROVISION", message, options);
  }
}

export type HealthCheckPhase = "booting" | "health-check";

export class HealthCheckError extends ShiftctlError {
  readonly workloadId: string;
  readonly phase: HealthCheckPhase;
  /** Last log lines seen on the boot stream before it failed. */
  readonly recentLogs: readonly string[];

  constructor(
    workloadId: string,
    phase: HealthCheckPhase,
    message: string,
    recentLogs: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super("HEALTH_CHECK", message, options);
    this.workloadId = workloadId;
    this.phase = phase;
    this.recentLogs = recentLogs;
  }
}

export class RegistrationError extends ShiftctlError {
  readonly workloadId: string;

  constructor(workloadId: string, message: string, options?: { cause?: unknown }) {
    super("REGISTRATION", message, options);
    this.workloadId = workloadId;
  }
}

/** Cleanup of the previous generation failed. Never fatal to a rollout. */
export class DecommissionError extends ShiftctlError {
  readonly resource: "target" | "workload";
  readonly resourceId: string;

  constructor(resource: "target" | "workload", resourceId: string, cause: unknown) {
    super(
      "DECOMMISSION",
      `Failed to ${resource === "target" ? "remove old target" : "stop old instance"} ${resourceId}: ${errorMessage(cause)}`,
      { cause },
    );
    this.resource = resource;
    this.resourceId = resourceId;
  }
}

export class ApiError extends ShiftctlError {
  readonly operation: string;
  readonly status: number;
  readonly reason?: string;

  constructor(operation: string, status: number, reason?: string, body?: string) {
    super("API", ApiError.describe(operation, status, reason, body));
    this.operation = operation;
    this.status = status;
    this.reason = reason;
  }

  private static describe(
    operation: string,
    status: number,
    reason?: string,
    body?: string,
  ): string {
    if (reason !== undefined) {
      return status === 503
        ? `Service temporarily unavailable: ${reason}`
        : `${operation}: ${reason}`;
    }
    if (status === 503) {
      return body ? `Service temporarily unavailable: ${body}` : "Service temporarily unavailable";
    }
    return body
      ? `Failed to ${operation}: HTTP ${status}: ${body}`
      : `Failed to ${operation}: HTTP ${status}`;
  }
}

export class AuthenticationError extends ShiftctlError {
  constructor(message: string) {
    super("AUTHENTICATION", message);
  }
}
