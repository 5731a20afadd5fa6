export type BootPhase = "pulling-image" | "online" | "executing-container";

export type LogSource = "system" | "stdout" | "stderr";

export type BootEvent =
  | { kind: "state"; state: BootPhase; at: Date }
  | { kind: "log"; source: LogSource; text: string; at: Date };

export interface BootProgress {
  workloadId: string;
  phase?: BootPhase;
  /** Most recent log lines, oldest first. */
  recentLogs: readonly string[];
  event: BootEvent;
}
