import { z } from "zod";
import { ResolutionError } from "@shiftctl/shared";
import type { EntityKind } from "@shiftctl/shared";

/** Anything addressable by id and, optionally, a name. */
export interface Identifiable {
  id: string;
  name?: string | null;
}

const uuidSchema = z.string().uuid();
const ID_PREFIX = /^[0-9a-fA-F-]+$/;

export function isUuid(input: string): boolean {
  return uuidSchema.safeParse(input).success;
}

/**
 * Resolve a user-provided identifier (full id, exact name, or unique id
 * prefix) against a list of resources.
 *
 * A well-formed id is returned without checking that it exists.
 */
export function resolveId(
  input: string,
  items: readonly Identifiable[],
  kind: EntityKind,
): string {
  if (isUuid(input)) {
    return input.toLowerCase();
  }

  const named = items.filter((item) => item.name === input);
  if (named.length === 1 && named[0]) {
    return named[0].id;
  }

  // A name shared by several items falls through to prefix matching.
  if (ID_PREFIX.test(input)) {
    const prefix = input.toLowerCase();
    const matches = items.filter((item) => item.id.toLowerCase().startsWith(prefix));
    if (matches.length === 1 && matches[0]) {
      return matches[0].id;
    }
    if (matches.length === 0) {
      throw new ResolutionError(kind, input, "not-found", `No ${kind} found matching '${input}'`);
    }
    throw new ResolutionError(
      kind,
      input,
      "ambiguous",
      `Ambiguous: ${matches.length} ${kind}s match prefix '${input}'. Be more specific.`,
      matches.length,
    );
  }

  throw new ResolutionError(
    kind,
    input,
    "not-found",
    `No ${kind} found with name or id '${input}'`,
  );
}
