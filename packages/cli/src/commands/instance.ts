import type { BootEvent, Workload } from '@shiftctl/shared';
import type { BootEventStream, WorkloadLifecycle } from '@shiftctl/deployer';
import { resolveId } from '@shiftctl/deployer';

export interface WorkloadOps {
  list(): Promise<Workload[]>;
  stop(workloadId: string, timeoutMs: number): Promise<void>;
}

export interface BootStreams {
  open(workloadId: string): Promise<BootEventStream>;
}

/** Instance identifiers only ever resolve against running instances. */
async function resolveRunning(workloads: Pick<WorkloadOps, 'list'>, input: string): Promise<string> {
  const running = (await workloads.list()).filter((w) => w.state === 'running');
  return resolveId(input, running, 'workload');
}

export function formatTable(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  '),
  );
}

export async function instanceListCommand(
  workloads: Pick<WorkloadOps, 'list'>,
  options: { includeStopped?: boolean },
): Promise<void> {
  const all = await workloads.list();
  const shown = options.includeStopped ? all : all.filter((w) => w.state === 'running');
  if (shown.length === 0) {
    console.log('No instances found.');
    return;
  }

  const rows = [
    ['ID', 'NAME', 'STATE', 'IMAGE', 'CREATED'],
    ...shown.map((w) => [w.id, w.name ?? '-', w.rawState, w.image ?? '-', w.createdAt]),
  ];
  for (const line of formatTable(rows)) {
    console.log(line);
  }
}

export async function instanceStopCommand(
  workloads: WorkloadOps,
  input: string,
  timeoutMs: number,
): Promise<void> {
  const id = await resolveRunning(workloads, input);
  await workloads.stop(id, timeoutMs);
  console.log(`Stopped instance ${id}`);
}

export function formatBootEvent(event: BootEvent): string {
  const time = event.at.toISOString();
  return event.kind === 'state'
    ? `${time} [state] ${event.state}`
    : `${time} [${event.source}] ${event.text}`;
}

async function printEvents(streams: BootStreams, workloadId: string): Promise<void> {
  const stream = await streams.open(workloadId);
  try {
    for (let event = await stream.next(); event !== null; event = await stream.next()) {
      console.log(formatBootEvent(event));
    }
  } finally {
    stream.close();
  }
}

export async function instanceLogsCommand(
  workloads: Pick<WorkloadOps, 'list'>,
  streams: BootStreams,
  input: string,
): Promise<void> {
  const id = await resolveRunning(workloads, input);
  await printEvents(streams, id);
}

export interface InstanceRunOptions {
  vcpus: number;
  memory: number;
  env: Record<string, string>;
  name?: string;
  network?: string;
  detach?: boolean;
}

/** Start one instance of `image` and follow its event stream until it closes. */
export async function instanceRunCommand(
  workloads: Pick<WorkloadLifecycle, 'verifyImageAndGetPullToken' | 'create'>,
  streams: BootStreams,
  image: string,
  args: string[],
  options: InstanceRunOptions,
): Promise<string> {
  const pullToken = await workloads.verifyImageAndGetPullToken(image);
  const id = await workloads.create(
    {
      image,
      vcpus: options.vcpus,
      memoryMb: options.memory,
      args,
      env: options.env,
      name: options.name,
      network: options.network,
    },
    pullToken,
  );
  console.log(`Started instance ${id}`);

  if (!options.detach) {
    await printEvents(streams, id);
  }
  return id;
}
