import { InvalidArgumentError } from 'commander';
import { isLogLevel } from '@shiftctl/shared';
import type { LeaveBehind, LogLevel } from '@shiftctl/shared';

// Argument parsers handed to commander. Each throws InvalidArgumentError,
// which commander reports against the offending option.

const MIN_MEMORY_MB = 128;
const MAX_MEMORY_MB = 128 * 1024;

export function intInRange(min: number, max?: number): (value: string) => number {
  return (value) => {
    if (!/^\d+$/.test(value)) {
      throw new InvalidArgumentError('Not a whole number.');
    }
    const parsed = parseInt(value, 10);
    if (max === undefined) {
      if (parsed < min || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError(`Must be at least ${min}.`);
      }
    } else if (parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Must be between ${min} and ${max}.`);
    }
    return parsed;
  };
}

export const parsePort = intInRange(1, 65535);
export const parseReplicas = intInRange(1);
export const parseVcpus = intInRange(1, 32);
export const parseTimeoutMs = intInRange(0, 600_000);

/** `512`, `512M` or `2G`, in megabytes. A bare number is megabytes. */
export function parseMemoryMb(value: string): number {
  const match = /^(\d+)([MmGg])?$/.exec(value.trim());
  if (!match?.[1]) {
    throw new InvalidArgumentError('Expected a size such as 512M or 2G.');
  }
  const amount = parseInt(match[1], 10);
  const megabytes = match[2]?.toUpperCase() === 'G' ? amount * 1024 : amount;
  if (megabytes < MIN_MEMORY_MB || megabytes > MAX_MEMORY_MB) {
    throw new InvalidArgumentError('Must be between 128M and 128G.');
  }
  return megabytes;
}

/** Collects repeated `-e KEY=VALUE` flags. The value may itself contain `=`. */
export function collectEnv(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got '${value}'.`);
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

export interface InstancePort {
  instance: string;
  port: number;
}

/** `<instance>:<port>`. */
export function parseInstancePort(value: string): InstancePort {
  const colon = value.lastIndexOf(':');
  if (colon <= 0) {
    throw new InvalidArgumentError(`Expected <instance>:<port>, got '${value}'.`);
  }
  return { instance: value.slice(0, colon), port: parsePort(value.slice(colon + 1)) };
}

export function parseLeaveBehind(value: string): LeaveBehind {
  if (value === 'instances' || value === 'targets') return value;
  throw new InvalidArgumentError("Allowed choices are instances, targets.");
}

export function parseLogLevel(value: string): LogLevel {
  if (isLogLevel(value)) return value;
  throw new InvalidArgumentError('Allowed choices are debug, info, warn, error.');
}
