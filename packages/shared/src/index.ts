// Types
export type * from "./types/api.js";
export type * from "./types/boot.js";
export type * from "./types/config.js";
export type * from "./types/rollout.js";

// Values
export { configSchema, parseConfig } from "./types/config.js";
export {
  DEFAULT_TARGET_GROUP,
  parseWorkloadState,
  serviceListSchema,
  serviceDetailSchema,
  workloadListSchema,
  createdWorkloadSchema,
  createdTargetSchema,
  networkListSchema,
  networkDetailSchema,
  errorBodySchema,
  bootFrameSchema,
} from "./types/api.js";

// Errors
export {
  ShiftctlError,
  ResolutionError,
  ValidationError,
  ProvisionError,
  HealthCheckError,
  RegistrationError,
  DecommissionError,
  ApiError,
  AuthenticationError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, EntityKind, ResolutionFailure, HealthCheckPhase } from "./errors.js";

// Utils
export { createLogger, setLogLevel, isLogLevel } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
export { bestEffort } from "./utils/best-effort.js";
export type { BestEffortFailure } from "./utils/best-effort.js";
