import { randomBytes } from "node:crypto";
import { ValidationError } from "@shiftctl/shared";

/** Random lowercase hex string of `width` characters. */
export type HexSource = (width: number) => string;

export const randomHex: HexSource = (width) =>
  randomBytes(Math.ceil(width / 2)).toString("hex").slice(0, width);

const WIDTHS = [4, 8];
const ATTEMPTS_PER_WIDTH = 32;

export function workloadName(
  serviceName: string,
  group: string,
  generation: string,
  index: number,
): string {
  return `${serviceName}_${group}_${generation}_${index}`;
}

/**
 * Pick a generation marker for `{service}_{group}_{hex}_{index}` names that
 * no existing instance name already uses. Four hex digits are tried first;
 * when those keep colliding the marker widens to eight.
 */
export function generateDeployHex(
  serviceName: string,
  group: string,
  existingNames: readonly string[],
  random: HexSource = randomHex,
): string {
  const namespace = `${serviceName}_${group}_`;
  const scoped = existingNames.filter((name) => name.startsWith(namespace));

  for (const width of WIDTHS) {
    for (let attempt = 0; attempt < ATTEMPTS_PER_WIDTH; attempt++) {
      const candidate = random(width);
      const prefix = `${namespace}${candidate}_`;
      if (!scoped.some((name) => name.startsWith(prefix))) {
        return candidate;
      }
    }
  }

  throw new ValidationError(
    `Could not find an unused deploy id for '${namespace}' after ${WIDTHS.length * ATTEMPTS_PER_WIDTH} attempts`,
  );
}
