import type { ServiceCatalog, TargetRegistry } from '@shiftctl/deployer';
import { resolveId } from '@shiftctl/deployer';
import type { Service, Workload } from '@shiftctl/shared';
import type { InstancePort } from '../parse.js';

export interface TargetCommandDeps {
  services: ServiceCatalog;
  workloads: { list(): Promise<Workload[]> };
  targets: TargetRegistry;
}

async function resolveService(services: ServiceCatalog, input: string): Promise<Service> {
  const all = await services.list();
  const id = resolveId(input, all, 'service');
  return all.find((s) => s.id === id) ?? { id, name: id, type: 'unknown' };
}

export async function targetAddCommand(
  deps: TargetCommandDeps,
  serviceInput: string,
  { instance, port }: InstancePort,
  group: string,
): Promise<string> {
  const service = await resolveService(deps.services, serviceInput);
  const running = (await deps.workloads.list()).filter((w) => w.state === 'running');
  const workloadId = resolveId(instance, running, 'workload');

  const targetId = await deps.targets.create(service.id, workloadId, port, group);
  console.log(
    `Added target ${targetId} (${workloadId}:${port}, group '${group}') to service '${service.name}'`,
  );
  return targetId;
}

export async function targetRemoveCommand(
  deps: Pick<TargetCommandDeps, 'services' | 'targets'>,
  serviceInput: string,
  targetInput: string,
): Promise<void> {
  const service = await resolveService(deps.services, serviceInput);
  const detail = await deps.services.get(service.id);
  const targetId = resolveId(targetInput, detail.targets, 'target');

  await deps.targets.remove(service.id, targetId);
  console.log(`Removed target ${targetId} from service '${service.name}'`);
}
