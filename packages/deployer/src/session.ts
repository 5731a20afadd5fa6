import { AuthenticationError } from "@shiftctl/shared";
import type { Config, RegistryCredentials } from "@shiftctl/shared";

/**
 * Credentials handle threaded through every client. There is exactly one per
 * process and it is passed in explicitly, never looked up globally.
 */
export interface Session {
  token(): Promise<string>;
  registryCredentials(registry: string): RegistryCredentials | undefined;
}

export class ConfigSession implements Session {
  private accessToken?: string;
  private registries: Record<string, RegistryCredentials>;

  constructor(config: Pick<Config, "token" | "registries">) {
    this.accessToken = config.token;
    this.registries = config.registries;
  }

  async token(): Promise<string> {
    if (!this.accessToken) {
      throw new AuthenticationError(
        "No authentication token found. Set SHIFTCTL_TOKEN or \"token\" in shiftctl.json.",
      );
    }
    return this.accessToken;
  }

  registryCredentials(registry: string): RegistryCredentials | undefined {
    return this.registries[registry];
  }
}
