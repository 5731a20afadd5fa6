import type { Config } from '@shiftctl/shared';
import { loadConfig } from '../config-loader.js';

export function validateCommand(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let config: Config;
  try {
    config = loadConfig(configPath, env);
  } catch (err) {
    console.error('Configuration validation failed!');
    throw err;
  }

  const registries = Object.keys(config.registries);
  console.log('Configuration is valid!');
  console.log('');
  console.log('Settings:');
  console.log(`  API host:         ${config.apiHost}`);
  console.log(`  Token:            ${config.token ? '(set)' : '(not set)'}`);
  console.log(`  Registries:       ${registries.length > 0 ? registries.join(', ') : '(none)'}`);
  console.log(`  Health window:    ${config.rollout.healthWindowMs}ms`);
  console.log(`  Stop timeout:     ${config.rollout.stopTimeoutMs}ms`);
  console.log(`  Log level:        ${config.logLevel}`);
  return config;
}
