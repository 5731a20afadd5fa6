import WebSocket from "ws";
import { bootFrameSchema, createLogger, errorMessage } from "@shiftctl/shared";
import type { BootEvent, BootFrame, BootPhase } from "@shiftctl/shared";
import type { ControlPlaneClient } from "../api-client.js";
import { EventChannel } from "./channel.js";

/** What a consumer of a boot event stream needs: read in order, then close. */
export interface BootEventStream {
  next(): Promise<BootEvent | null>;
  close(): void;
}

export type BootEventSource = (workloadId: string) => Promise<BootEventStream>;

/**
 * Minimal socket surface the stream needs, so tests can drive it without a
 * network connection.
 */
export interface BootSocket {
  onMessage(listener: (text: string) => void): void;
  onClose(listener: () => void): void;
  onError(listener: (err: Error) => void): void;
  close(): void;
}

export type BootSocketFactory = (url: string, headers: Record<string, string>) => BootSocket;

const PHASES: Record<NonNullable<BootFrame["state"]>, BootPhase> = {
  pulling_container_image: "pulling-image",
  online: "online",
  executing_container: "executing-container",
};

export function toBootEvent(frame: BootFrame): BootEvent {
  const at = new Date(frame.timestamp_ms);
  if (frame.log_type === "state") {
    if (!frame.state) throw new Error("State message without a state");
    return { kind: "state", state: PHASES[frame.state], at };
  }
  return { kind: "log", source: frame.log_type, text: frame.message ?? "", at };
}

export function parseBootFrame(text: string): BootEvent {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse log message: ${errorMessage(err)}`);
  }
  const frame = bootFrameSchema.safeParse(json);
  if (!frame.success) {
    throw new Error(`Failed to parse log message: ${frame.error.issues[0]?.message ?? "invalid frame"}`);
  }
  return toBootEvent(frame.data);
}

function rawToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export const wsSocketFactory: BootSocketFactory = (url, headers) => {
  const socket = new WebSocket(url, { headers });
  return {
    onMessage(listener) {
      socket.on("message", (data, isBinary) => {
        if (!isBinary) listener(rawToText(data));
      });
    },
    onClose(listener) {
      socket.on("close", () => listener());
    },
    onError(listener) {
      socket.on("error", listener);
    },
    close() {
      socket.close();
    },
  };
};

export interface BootStreamClientOptions {
  client: ControlPlaneClient;
  socketFactory?: BootSocketFactory;
}

/**
 * Opens `/instance/{id}/logs/stream` and exposes it as an ordered stream of
 * boot events. A frame that fails to parse fails the stream.
 */
export class BootStreamClient {
  private logger = createLogger("boot-stream");
  private client: ControlPlaneClient;
  private socketFactory: BootSocketFactory;

  constructor(options: BootStreamClientOptions) {
    this.client = options.client;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
  }

  async open(workloadId: string): Promise<BootEventStream> {
    const url = this.client.wsUrl(`/instance/${encodeURIComponent(workloadId)}/logs/stream`);
    const socket = this.socketFactory(url, await this.client.authHeaders());
    const channel = new EventChannel<BootEvent>(() => socket.close());
    this.logger.debug(`Streaming events for ${workloadId}`);

    socket.onMessage((text) => {
      try {
        channel.push(parseBootFrame(text));
      } catch (err) {
        channel.fail(err instanceof Error ? err : new Error(String(err)));
        socket.close();
      }
    });
    socket.onClose(() => {
      this.logger.debug(`Event stream for ${workloadId} closed`);
      channel.end();
    });
    socket.onError((err) => {
      this.logger.debug(`Event stream for ${workloadId} failed: ${err.message}`);
      channel.fail(err);
    });

    return channel;
  }

  /** Bound `open`, for handing to a BootMonitor. */
  get source(): BootEventSource {
    return (workloadId) => this.open(workloadId);
  }
}
