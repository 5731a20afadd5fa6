import { z } from "zod";
import { createLogger, errorMessage, ProvisionError, ShiftctlError } from "@shiftctl/shared";
import type { FetchLike } from "../api-client.js";
import type { Session } from "../session.js";
import {
  DOCKER_HUB,
  manifestReference,
  formatImageReference,
  parseImageReference,
  type ImageReference,
} from "./reference.js";

const MANIFEST_ACCEPT = [
  "application/vnd.oci.image.index.v1+json",
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
  "application/vnd.docker.distribution.manifest.v2+json",
].join(", ");

const tokenResponseSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
  expires_in: z.number().optional(),
});

const schemaVersionSchema = z.object({ schemaVersion: z.number().optional() }).passthrough();

const descriptorSchema = z.object({
  mediaType: z.string().optional(),
  digest: z.string(),
  size: z.number().optional(),
});

const imageIndexSchema = z.object({
  schemaVersion: z.literal(2),
  manifests: z.array(
    descriptorSchema.extend({
      platform: z.object({ architecture: z.string(), os: z.string() }).optional(),
    }),
  ),
});

const imageManifestSchema = z.object({
  schemaVersion: z.literal(2),
  config: descriptorSchema,
  layers: z.array(descriptorSchema),
});

export type ImageManifest = z.infer<typeof imageManifestSchema>;

export interface AuthChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/**
 * Parse a `WWW-Authenticate` header of the form
 * `Bearer realm="https://auth.example.com/token",service="registry.example.com"`.
 */
export function parseWwwAuthenticate(header: string): AuthChallenge {
  if (!header.startsWith("Bearer ")) {
    throw new Error("Unsupported authentication scheme, expected Bearer auth");
  }

  const params = new Map<string, string>();
  for (const part of header.slice("Bearer ".length).split(",")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    const key = part.slice(0, eq).trim();
    const value = part.slice(eq + 1).trim().replace(/^"|"$/g, "");
    params.set(key, value);
  }

  const realm = params.get("realm");
  if (!realm) throw new Error("No realm found in WWW-Authenticate header");
  return { realm, service: params.get("service"), scope: params.get("scope") };
}

export interface Platform {
  os: string;
  architecture: string;
}

export interface RegistryClientOptions {
  session: Session;
  fetch?: FetchLike;
  platform?: Platform;
}

/**
 * RegistryClient checks that an image exists and can be pulled before any
 * instance is created, and hands back a repository-scoped pull token.
 */
export class RegistryClient {
  private logger = createLogger("registry");
  private session: Session;
  private fetchImpl: FetchLike;
  private platform: Platform;

  constructor(options: RegistryClientOptions) {
    this.session = options.session;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.platform = options.platform ?? { os: "linux", architecture: "amd64" };
  }

  /** Returns the pull token, or null when the registry allows anonymous pulls. */
  async verifyAndGetPullToken(image: string): Promise<string | null> {
    const ref = parseImageReference(image);
    try {
      const token = await this.getToken(ref);
      await this.fetchManifest(ref, token);
      this.logger.info(`Verified image ${formatImageReference(ref)}`);
      return token;
    } catch (err) {
      if (err instanceof ShiftctlError) throw err;
      throw new ProvisionError(`Failed to verify image '${image}': ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async getToken(ref: ImageReference): Promise<string | null> {
    const credentials = this.session.registryCredentials(ref.registry);
    if (!credentials?.username && ref.registry !== DOCKER_HUB) {
      throw new ProvisionError(
        `No credentials found for registry '${ref.registry}'. Add them under "registries" in shiftctl.json.`,
      );
    }
    try {
      return await this.getScopedToken(ref, credentials?.username, credentials?.password);
    } catch (err) {
      throw new ProvisionError(
        `Failed to authenticate with registry '${ref.registry}': ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async getScopedToken(
    ref: ImageReference,
    username?: string,
    password?: string,
  ): Promise<string | null> {
    const v2Url = `https://${ref.registry}/v2/`;
    this.logger.debug(`Checking registry endpoint for scoped token: ${v2Url}`);
    const probe = await this.fetchImpl(v2Url);
    if (probe.ok) {
      this.logger.debug("Registry allows anonymous access");
      return null;
    }

    const header = probe.headers.get("www-authenticate");
    if (!header) throw new Error("No WWW-Authenticate header found");
    const challenge = parseWwwAuthenticate(header);

    const authUrl = new URL(challenge.realm);
    if (challenge.service) authUrl.searchParams.set("service", challenge.service);
    authUrl.searchParams.set("scope", `repository:${ref.repository}:pull`);

    const headers: Record<string, string> = {};
    if (username && password) {
      headers.Authorization = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
    }

    this.logger.debug(`Requesting scoped token from: ${authUrl.toString()}`);
    const resp = await this.fetchImpl(authUrl.toString(), { headers });
    if (!resp.ok) throw new Error(`Failed to get scoped token: HTTP ${resp.status}`);

    const body = tokenResponseSchema.parse(await resp.json());
    return body.token ?? body.access_token ?? null;
  }

  async fetchManifest(ref: ImageReference, token: string | null): Promise<ImageManifest> {
    const document = await this.getManifestDocument(ref, manifestReference(ref), token);
    const { schemaVersion } = schemaVersionSchema.parse(document);
    if (schemaVersion === undefined) {
      throw new Error("No schema version found in image manifest");
    }
    if (schemaVersion !== 2) {
      throw new Error(`Unsupported image manifest schema version: ${schemaVersion}`);
    }

    const index = imageIndexSchema.safeParse(document);
    if (!index.success) {
      this.logger.debug("Detected direct image manifest");
      return imageManifestSchema.parse(document);
    }

    this.logger.debug("Detected image index (multi-platform)");
    const { os, architecture } = this.platform;
    const descriptor = index.data.manifests.find(
      (d) => d.platform?.os === os && d.platform.architecture === architecture,
    );
    if (!descriptor) {
      throw new Error(`No compatible ${os}/${architecture} image found`);
    }
    return imageManifestSchema.parse(
      await this.getManifestDocument(ref, descriptor.digest, token),
    );
  }

  private async getManifestDocument(
    ref: ImageReference,
    reference: string,
    token: string | null,
  ): Promise<unknown> {
    const url = `https://${ref.registry}/v2/${ref.repository}/manifests/${reference}`;
    this.logger.debug(`Fetching manifest from ${url}`);
    const headers: Record<string, string> = { Accept: MANIFEST_ACCEPT };
    if (token) headers.Authorization = `Bearer ${token}`;

    const resp = await this.fetchImpl(url, { headers });
    if (!resp.ok) throw new Error(`Failed to fetch manifest: HTTP ${resp.status}`);
    return resp.json();
  }
}
