import type { ServiceCatalog } from '@shiftctl/deployer';
import { resolveId } from '@shiftctl/deployer';
import { formatTable } from './instance.js';

export async function serviceListCommand(services: Pick<ServiceCatalog, 'list'>): Promise<void> {
  const all = await services.list();
  if (all.length === 0) {
    console.log('No services found.');
    return;
  }

  const rows = [['ID', 'NAME', 'TYPE'], ...all.map((s) => [s.id, s.name, s.type])];
  for (const line of formatTable(rows)) {
    console.log(line);
  }
}

export async function serviceInfoCommand(services: ServiceCatalog, input: string): Promise<void> {
  const id = resolveId(input, await services.list(), 'service');
  const service = await services.get(id);

  console.log(`Service ${service.id}`);
  console.log(`  Name:  ${service.name}`);
  console.log(`  Type:  ${service.type}`);
  console.log('');

  if (service.targets.length === 0) {
    console.log('No targets configured.');
    return;
  }

  console.log(`Targets (${service.targets.length}):`);
  const rows = [
    ['ID', 'INSTANCE', 'PORT', 'GROUP'],
    ...service.targets.map((t) => [t.id, t.workloadId, String(t.port), t.group]),
  ];
  for (const line of formatTable(rows)) {
    console.log(`  ${line}`);
  }
}
