import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Hono } from "hono";
import { ProvisionError } from "@shiftctl/shared";
import { RegistryClient, parseWwwAuthenticate } from "../registry/client.js";
import {
  formatImageReference,
  manifestReference,
  parseImageReference,
} from "../registry/reference.js";
import { ConfigSession } from "../session.js";

const DIGEST_AMD64 = `sha256:${"a".repeat(64)}`;
const DIGEST_ARM64 = `sha256:${"b".repeat(64)}`;

const platformManifest = {
  schemaVersion: 2,
  config: { digest: `sha256:${"c".repeat(64)}`, size: 100 },
  layers: [{ digest: `sha256:${"d".repeat(64)}`, size: 2000 }],
};

interface RegistryOptions {
  anonymous?: boolean;
  rejectLogin?: boolean;
  platforms?: Array<{ os: string; architecture: string; digest: string }>;
}

/** Fake registry plus its token service, behind one Hono app. */
function fakeRegistry(options: RegistryOptions = {}) {
  const app = new Hono();
  const requests: Array<{ url: string; authorization?: string }> = [];
  app.use("*", async (c, next) => {
    requests.push({ url: c.req.url, authorization: c.req.header("Authorization") });
    await next();
  });

  app.get("/v2/", (c) => {
    if (options.anonymous) return c.json({});
    c.header(
      "WWW-Authenticate",
      'Bearer realm="https://auth.example.com/token",service="registry.example.com"',
    );
    return c.json({ errors: [] }, 401);
  });

  app.get("/token", (c) => {
    const expected = `Basic ${Buffer.from("deploy:test-password").toString("base64")}`;
    if (options.rejectLogin || c.req.header("Authorization") !== expected) {
      return c.json({ details: "bad credentials" }, 401);
    }
    return c.json({ token: `pull-token:${c.req.query("scope")}` });
  });

  app.get("/v2/:namespace/:repo/manifests/:reference", (c) => {
    const reference = c.req.param("reference");
    if (reference === "v2") {
      if (!options.platforms) return c.json(platformManifest);
      return c.json({
        schemaVersion: 2,
        mediaType: "application/vnd.oci.image.index.v1+json",
        manifests: options.platforms.map(({ digest, os, architecture }) => ({
          digest,
          size: 500,
          platform: { os, architecture },
        })),
      });
    }
    if (reference === DIGEST_AMD64 || reference === DIGEST_ARM64) {
      return c.json(platformManifest);
    }
    if (reference === "legacy") return c.json({ schemaVersion: 1 });
    return c.json({ errors: [{ code: "MANIFEST_UNKNOWN" }] }, 404);
  });

  const fetch = async (input: string, init?: RequestInit) => app.request(input, init);
  return { fetch, requests };
}

function client(fetch: (input: string, init?: RequestInit) => Promise<Response>, withCredentials = true) {
  const session = new ConfigSession({
    token: "test-token",
    registries: withCredentials
      ? { "registry.example.com": { username: "deploy", password: "test-password" } }
      : {},
  });
  return new RegistryClient({ session, fetch });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseImageReference", () => {
  it("expands Docker Hub shorthand", () => {
    expect(parseImageReference("nginx")).toEqual({
      registry: "index.docker.io",
      repository: "library/nginx",
    });
    expect(parseImageReference("docker.io/bitnami/redis:7.2")).toEqual({
      registry: "index.docker.io",
      repository: "bitnami/redis",
      tag: "7.2",
    });
  });

  it("recognises a registry host with a port", () => {
    expect(parseImageReference("localhost:5000/app:dev")).toEqual({
      registry: "localhost:5000",
      repository: "app",
      tag: "dev",
    });
    expect(parseImageReference("localhost:5000/app")).toEqual({
      registry: "localhost:5000",
      repository: "app",
    });
  });

  it("keeps a digest", () => {
    expect(parseImageReference(`registry.example.com/team/app@${DIGEST_AMD64}`)).toEqual({
      registry: "registry.example.com",
      repository: "team/app",
      digest: DIGEST_AMD64,
    });
  });

  it("rejects malformed references", () => {
    expect(() => parseImageReference("")).toThrow("Invalid image reference '': reference is empty");
    expect(() => parseImageReference("Nginx")).toThrow(
      "Invalid image reference 'Nginx': repository must be lowercase path components",
    );
    expect(() => parseImageReference("app@sha256:short")).toThrow(ProvisionError);
  });

  it("requests the digest, then the tag, then latest", () => {
    expect(manifestReference({ registry: "r", repository: "a", tag: "v1", digest: DIGEST_AMD64 })).toBe(
      DIGEST_AMD64,
    );
    expect(manifestReference({ registry: "r", repository: "a", tag: "v1" })).toBe("v1");
    expect(manifestReference({ registry: "r", repository: "a" })).toBe("latest");
  });

  it("formats a normalised reference", () => {
    expect(formatImageReference(parseImageReference("nginx"))).toBe("index.docker.io/library/nginx:latest");
  });
});

describe("parseWwwAuthenticate", () => {
  it("reads realm, service and scope", () => {
    expect(
      parseWwwAuthenticate(
        'Bearer realm="https://auth.example.com/token",service="registry.example.com",scope="repository:team/app:pull"',
      ),
    ).toEqual({
      realm: "https://auth.example.com/token",
      service: "registry.example.com",
      scope: "repository:team/app:pull",
    });
  });

  it("rejects other schemes and missing realms", () => {
    expect(() => parseWwwAuthenticate('Basic realm="x"')).toThrow(
      "Unsupported authentication scheme, expected Bearer auth",
    );
    expect(() => parseWwwAuthenticate('Bearer service="x"')).toThrow(
      "No realm found in WWW-Authenticate header",
    );
  });
});

describe("RegistryClient.verifyAndGetPullToken", () => {
  it("returns a repository-scoped pull token once the manifest is found", async () => {
    const registry = fakeRegistry();

    const token = await client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:v2");

    expect(token).toBe("pull-token:repository:team/app:pull");
    expect(registry.requests.map((r) => r.url)).toEqual([
      "https://registry.example.com/v2/",
      "https://auth.example.com/token?service=registry.example.com&scope=repository%3Ateam%2Fapp%3Apull",
      "https://registry.example.com/v2/team/app/manifests/v2",
    ]);
    expect(registry.requests[2]?.authorization).toBe("Bearer pull-token:repository:team/app:pull");
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/\[INFO\] \[registry\] Verified image registry\.example\.com\/team\/app:v2$/),
    );
  });

  it("follows an image index to the linux/amd64 manifest", async () => {
    const registry = fakeRegistry({
      platforms: [
        { os: "linux", architecture: "arm64", digest: DIGEST_ARM64 },
        { os: "linux", architecture: "amd64", digest: DIGEST_AMD64 },
      ],
    });

    await client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:v2");

    expect(registry.requests.at(-1)?.url).toBe(
      `https://registry.example.com/v2/team/app/manifests/${DIGEST_AMD64}`,
    );
  });

  it("fails when the index has no linux/amd64 image", async () => {
    const registry = fakeRegistry({
      platforms: [{ os: "linux", architecture: "arm64", digest: DIGEST_ARM64 }],
    });

    await expect(
      client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:v2"),
    ).rejects.toThrow(
      "Failed to verify image 'registry.example.com/team/app:v2': No compatible linux/amd64 image found",
    );
  });

  it("pulls anonymously when the registry allows it", async () => {
    const registry = fakeRegistry({ anonymous: true });

    const token = await client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:v2");

    expect(token).toBeNull();
    expect(registry.requests.map((r) => r.authorization)).toEqual([undefined, undefined]);
  });

  it("requires credentials for registries other than Docker Hub", async () => {
    const registry = fakeRegistry();

    await expect(
      client(registry.fetch, false).verifyAndGetPullToken("registry.example.com/team/app:v2"),
    ).rejects.toThrow(
      `No credentials found for registry 'registry.example.com'. Add them under "registries" in shiftctl.json.`,
    );
    expect(registry.requests).toEqual([]);
  });

  it("reports a rejected login", async () => {
    const registry = fakeRegistry({ rejectLogin: true });

    await expect(
      client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:v2"),
    ).rejects.toThrow(
      "Failed to authenticate with registry 'registry.example.com': Failed to get scoped token: HTTP 401",
    );
  });

  it("reports a missing tag", async () => {
    const registry = fakeRegistry();

    const error = await client(registry.fetch)
      .verifyAndGetPullToken("registry.example.com/team/app:v3")
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisionError);
    expect(error).toMatchObject({
      message: "Failed to verify image 'registry.example.com/team/app:v3': Failed to fetch manifest: HTTP 404",
    });
  });

  it("rejects schema version 1 manifests", async () => {
    const registry = fakeRegistry();

    await expect(
      client(registry.fetch).verifyAndGetPullToken("registry.example.com/team/app:legacy"),
    ).rejects.toThrow("Unsupported image manifest schema version: 1");
  });
});
