import { ProvisionError } from "@shiftctl/shared";

export const DOCKER_HUB = "index.docker.io";

export interface ImageReference {
  registry: string;
  repository: string;
  tag?: string;
  digest?: string;
}

const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG = /^[\w][\w.-]{0,127}$/;
const DIGEST = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-zA-Z0-9=_-]{32,}$/;

function looksLikeRegistry(component: string): boolean {
  return component.includes(".") || component.includes(":") || component === "localhost";
}

function invalid(input: string, why: string): ProvisionError {
  return new ProvisionError(`Invalid image reference '${input}': ${why}`);
}

/**
 * Parse `[registry/]repository[:tag][@digest]`, normalising Docker Hub
 * references the way `docker pull` does (`nginx` → `index.docker.io/library/nginx`).
 */
export function parseImageReference(input: string): ImageReference {
  const trimmed = input.trim();
  if (!trimmed) throw invalid(input, "reference is empty");

  let remainder = trimmed;
  let digest: string | undefined;
  const at = remainder.indexOf("@");
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
    if (!DIGEST.test(digest)) throw invalid(input, `malformed digest '${digest}'`);
  }

  let tag: string | undefined;
  const lastColon = remainder.lastIndexOf(":");
  if (lastColon > remainder.lastIndexOf("/")) {
    tag = remainder.slice(lastColon + 1);
    remainder = remainder.slice(0, lastColon);
    if (!TAG.test(tag)) throw invalid(input, `malformed tag '${tag}'`);
  }

  const components = remainder.split("/");
  let registry = DOCKER_HUB;
  const first = components[0];
  if (components.length > 1 && first !== undefined && looksLikeRegistry(first)) {
    registry = first === "docker.io" ? DOCKER_HUB : first;
    components.shift();
  }

  if (components.length === 0 || components.some((c) => !PATH_COMPONENT.test(c))) {
    throw invalid(input, "repository must be lowercase path components");
  }
  if (registry === DOCKER_HUB && components.length === 1) {
    components.unshift("library");
  }

  return { registry, repository: components.join("/"), tag, digest };
}

/** The tag or digest to request from the registry's manifest endpoint. */
export function manifestReference(ref: ImageReference): string {
  return ref.digest ?? ref.tag ?? "latest";
}

export function formatImageReference(ref: ImageReference): string {
  const base = `${ref.registry}/${ref.repository}`;
  if (ref.digest) return `${base}@${ref.digest}`;
  return `${base}:${ref.tag ?? "latest"}`;
}
