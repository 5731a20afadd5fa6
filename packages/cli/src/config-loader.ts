import { configSchema, ValidationError } from '@shiftctl/shared';
import type { Config } from '@shiftctl/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const DEFAULT_CONFIG_FILE = 'shiftctl.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ValidationError(
      `Failed to read config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function toInt(value: string): number {
  return /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: Record<string, unknown> = {};

  // 1. Try configPath if provided, else look for shiftctl.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new ValidationError(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve(DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Environment overrides
  const rollout = isRecord(raw.rollout) ? { ...raw.rollout } : {};

  if (env.SHIFTCTL_API_HOST) {
    raw.apiHost = env.SHIFTCTL_API_HOST;
  }
  if (env.SHIFTCTL_TOKEN) {
    raw.token = env.SHIFTCTL_TOKEN;
  }
  if (env.SHIFTCTL_LOG_LEVEL) {
    raw.logLevel = env.SHIFTCTL_LOG_LEVEL;
  }
  if (env.SHIFTCTL_HEALTH_WINDOW_MS) {
    rollout.healthWindowMs = toInt(env.SHIFTCTL_HEALTH_WINDOW_MS);
  }
  if (env.SHIFTCTL_STOP_TIMEOUT_MS) {
    rollout.stopTimeoutMs = toInt(env.SHIFTCTL_STOP_TIMEOUT_MS);
  }

  // 3. Validate with zod and return typed Config
  const result = configSchema.safeParse({ ...raw, rollout });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
