import type { Network } from '@shiftctl/shared';
import { formatTable } from './instance.js';

export async function networkListCommand(networks: { list(): Promise<Network[]> }): Promise<void> {
  const all = await networks.list();
  if (all.length === 0) {
    console.log('No networks found.');
    return;
  }

  const rows = [['ID', 'NAME', 'CIDR'], ...all.map((n) => [n.id, n.name, n.ipv4Cidr])];
  for (const line of formatTable(rows)) {
    console.log(line);
  }
}
