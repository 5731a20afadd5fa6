import { createLogger, HealthCheckError } from '@shiftctl/shared';
import type { BootProgress, LeaveBehind, RolloutRequest, RolloutResult } from '@shiftctl/shared';

export interface RolloutCliOptions {
  group: string;
  port?: number;
  replicas?: number;
  vcpus: number;
  memory: number;
  env: Record<string, string>;
  network?: string;
  leaveBehind?: LeaveBehind;
}

export interface RolloutRunner {
  rollout(request: RolloutRequest): Promise<RolloutResult>;
}

export async function rolloutCommand(
  orchestrator: RolloutRunner,
  service: string,
  image: string,
  args: string[],
  options: RolloutCliOptions,
): Promise<RolloutResult> {
  const logger = createLogger('cli');

  const onBootProgress = ({ workloadId, event }: BootProgress) => {
    const short = workloadId.slice(0, 8);
    if (event.kind === 'state') {
      logger.info(`${short}: ${event.state}`);
    } else {
      logger.debug(`${short} [${event.source}] ${event.text}`);
    }
  };

  let result: RolloutResult;
  try {
    result = await orchestrator.rollout({
      service,
      image,
      group: options.group,
      port: options.port,
      replicas: options.replicas,
      vcpus: options.vcpus,
      memoryMb: options.memory,
      env: options.env,
      args,
      network: options.network,
      leaveBehind: options.leaveBehind,
      onBootProgress,
    });
  } catch (err) {
    if (err instanceof HealthCheckError && err.recentLogs.length > 0) {
      console.error(`Last output of ${err.workloadId}:`);
      for (const line of err.recentLogs) {
        console.error(`  ${line}`);
      }
    }
    throw err;
  }

  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  console.log(
    `Rolled out ${result.workloadIds.length} replica(s) of group '${result.group}' on service '${result.serviceName}'.`,
  );
  return result;
}
