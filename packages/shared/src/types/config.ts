import { z } from "zod";

export const registryCredentialsSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
});

export const configSchema = z.object({
  apiHost: z.string().url().default("http://localhost:8080"),
  token: z.string().min(1).optional(),
  registries: z.record(registryCredentialsSchema).default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  rollout: z
    .object({
      healthWindowMs: z.number().int().min(0).max(600_000).default(1000),
      stopTimeoutMs: z.number().int().min(0).max(600_000).default(5000),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type RegistryCredentials = z.infer<typeof registryCredentialsSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}
