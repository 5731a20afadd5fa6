import { createLogger, ApiError, errorBodySchema } from "@shiftctl/shared";
import type { z } from "zod";
import type { Session } from "./session.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** A zod schema whose output is `T`, whatever wire shape it accepts. */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ControlPlaneClientOptions {
  apiHost: string;
  session: Session;
  fetch?: FetchLike;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * ControlPlaneClient performs authenticated JSON calls against the control
 * plane API. Non-2xx responses surface as ApiError, with the `reason` field
 * of a JSON error body when the API sends one.
 */
export class ControlPlaneClient {
  private logger = createLogger("api-client");
  private apiHost: string;
  private session: Session;
  private fetchImpl: FetchLike;

  constructor(options: ControlPlaneClientOptions) {
    this.apiHost = options.apiHost.replace(/\/+$/, "");
    this.session = options.session;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  url(path: string): string {
    return `${this.apiHost}${path}`;
  }

  wsUrl(path: string): string {
    return this.url(path).replace(/^http/, "ws");
  }

  async authHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.session.token()}` };
  }

  async get<T>(path: string, operation: string, schema: ResponseSchema<T>): Promise<T> {
    const resp = await this.send("GET", path, operation);
    return schema.parse(await resp.json());
  }

  async post<T>(
    path: string,
    operation: string,
    body: unknown,
    schema: ResponseSchema<T>,
  ): Promise<T> {
    const resp = await this.send("POST", path, operation, body);
    return schema.parse(await resp.json());
  }

  async delete(path: string, operation: string, body?: unknown): Promise<void> {
    await this.send("DELETE", path, operation, body);
  }

  private async send(
    method: string,
    path: string,
    operation: string,
    body?: unknown,
  ): Promise<Response> {
    const headers: Record<string, string> = await this.authHeaders();
    if (body !== undefined) headers["Content-Type"] = "application/json";

    this.logger.debug(`${method} ${path}`);
    const resp = await this.fetchImpl(this.url(path), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!resp.ok) {
      const text = await resp.text();
      const parsed = errorBodySchema.safeParse(parseJson(text));
      throw new ApiError(
        operation,
        resp.status,
        parsed.success ? parsed.data.reason : undefined,
        text || undefined,
      );
    }
    return resp;
  }
}
