import { Command, Option } from 'commander';
import { setLogLevel, DEFAULT_TARGET_GROUP } from '@shiftctl/shared';
import type { Config, LogLevel } from '@shiftctl/shared';
import { createDeployer } from '@shiftctl/deployer';
import type { Deployer } from '@shiftctl/deployer';
import { loadConfig } from './config-loader.js';
import {
  collectEnv,
  parseInstancePort,
  parseLeaveBehind,
  parseLogLevel,
  parseMemoryMb,
  parsePort,
  parseReplicas,
  parseTimeoutMs,
  parseVcpus,
  type InstancePort,
} from './parse.js';
import { rolloutCommand, type RolloutCliOptions } from './commands/rollout.js';
import {
  instanceListCommand,
  instanceLogsCommand,
  instanceRunCommand,
  instanceStopCommand,
  type InstanceRunOptions,
} from './commands/instance.js';
import { networkListCommand } from './commands/network.js';
import { serviceInfoCommand, serviceListCommand } from './commands/service.js';
import { targetAddCommand, targetRemoveCommand } from './commands/target.js';
import { validateCommand } from './commands/validate.js';

type GlobalOptions = {
  config?: string;
  logLevel?: LogLevel;
};

export interface ProgramOptions {
  env?: NodeJS.ProcessEnv;
  makeDeployer?: (config: Config) => Deployer;
}

export function buildProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const makeDeployer = options.makeDeployer ?? ((config: Config) => createDeployer({ config }));

  const program = new Command();

  program
    .name('shiftctl')
    .description('Rolling updates for workloads behind a service target group')
    .version('0.1.0')
    .option('--config <path>', 'Path to config file (default: ./shiftctl.json)')
    .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel);

  // Loaded per command so that `validate` can report a broken config itself.
  const context = (): { config: Config; deployer: Deployer } => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig(globals.config, env);
    setLogLevel(globals.logLevel ?? config.logLevel);
    return { config, deployer: makeDeployer(config) };
  };

  program
    .command('rollout')
    .description('Replace the instances behind a target group with instances of a new image')
    .argument('<service>', 'Service id, id prefix or name')
    .argument('<image>', 'Container image reference')
    .argument('[args...]', 'Container arguments, after --')
    .option('-g, --group <group>', 'Target group to roll', DEFAULT_TARGET_GROUP)
    .option('-p, --port <port>', 'Instance port (default: the port of the existing targets)', parsePort)
    .option('-r, --replicas <count>', 'Replica count (default: the number of existing targets)', parseReplicas)
    .option('-c, --vcpus <count>', 'vCPUs per instance', parseVcpus, 1)
    .option('-m, --memory <size>', 'Memory per instance, e.g. 512M or 2G', parseMemoryMb, 1024)
    .option('-e, --env <KEY=VALUE>', 'Environment variable (repeatable)', collectEnv, {})
    .option('--network <[ip]@network>', 'Join a network, allocating an address unless one is given')
    .option(
      '--leave-behind <what>',
      'Keep the old generation: instances (deregister only) or targets (keep both)',
      parseLeaveBehind,
    )
    .action(async (service: string, image: string, args: string[], opts: RolloutCliOptions) => {
      await rolloutCommand(context().deployer.orchestrator, service, image, args, opts);
    });

  const instance = program.command('instance').description('Inspect and manage instances');

  instance
    .command('list')
    .description('List instances')
    .option('-a, --include-stopped', 'Include stopped instances')
    .action(async (opts: { includeStopped?: boolean }) => {
      await instanceListCommand(context().deployer.workloads, opts);
    });

  instance
    .command('run')
    .description('Start an instance and follow its event stream')
    .argument('<image>', 'Container image reference')
    .argument('[args...]', 'Container arguments, after --')
    .option('-c, --vcpus <count>', 'vCPUs', parseVcpus, 1)
    .option('-m, --memory <size>', 'Memory, e.g. 512M or 2G', parseMemoryMb, 1024)
    .option('-e, --env <KEY=VALUE>', 'Environment variable (repeatable)', collectEnv, {})
    .option('-n, --name <name>', 'Instance name')
    .option('--network <[ip]@network>', 'Join a network, allocating an address unless one is given')
    .option('-d, --detach', 'Return once the instance is created')
    .action(async (image: string, args: string[], opts: InstanceRunOptions) => {
      const { deployer } = context();
      await instanceRunCommand(deployer.workloads, deployer.bootStream, image, args, opts);
    });

  instance
    .command('stop')
    .description('Stop a running instance')
    .argument('<instance>', 'Instance id, id prefix or name')
    .addOption(
      new Option('-t, --timeout <ms>', 'Graceful stop timeout in milliseconds').argParser(parseTimeoutMs),
    )
    .action(async (input: string, opts: { timeout?: number }) => {
      const { config, deployer } = context();
      await instanceStopCommand(deployer.workloads, input, opts.timeout ?? config.rollout.stopTimeoutMs);
    });

  instance
    .command('logs')
    .description('Print the event stream of a running instance until it closes')
    .argument('<instance>', 'Instance id, id prefix or name')
    .action(async (input: string) => {
      const { deployer } = context();
      await instanceLogsCommand(deployer.workloads, deployer.bootStream, input);
    });

  const target = program.command('target').description('Manage service targets');

  target
    .command('add')
    .description('Route a target group of a service to an instance port')
    .argument('<service>', 'Service id, id prefix or name')
    .argument('<instance:port>', 'Instance and port to route to', parseInstancePort)
    .option('-g, --group <group>', 'Target group', DEFAULT_TARGET_GROUP)
    .action(async (service: string, instancePort: InstancePort, opts: { group: string }) => {
      await targetAddCommand(context().deployer, service, instancePort, opts.group);
    });

  target
    .command('rm')
    .description('Remove a target from a service')
    .argument('<service>', 'Service id, id prefix or name')
    .argument('<target>', 'Target id or id prefix')
    .action(async (service: string, targetInput: string) => {
      await targetRemoveCommand(context().deployer, service, targetInput);
    });

  const service = program.command('service').description('Inspect services');

  service
    .command('list')
    .description('List services')
    .action(async () => {
      await serviceListCommand(context().deployer.services);
    });

  service
    .command('info')
    .alias('show')
    .description('Show a service and its targets')
    .argument('<service>', 'Service id, id prefix or name')
    .action(async (input: string) => {
      await serviceInfoCommand(context().deployer.services, input);
    });

  const network = program.command('network').description('Inspect networks');

  network
    .command('list')
    .description('List networks')
    .action(async () => {
      await networkListCommand(context().deployer.networks);
    });

  program
    .command('validate')
    .description('Validate the configuration and print the effective settings')
    .action(() => {
      validateCommand(program.opts<GlobalOptions>().config, env);
    });

  return program;
}
