import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

import envPaths from 'env-paths';

import type { Env } from './env';

export interface AppPaths {
  configDir: string;
  dataDir: string;
  logsDir: string;
  homeDir: string;
  configFile: string;
  stateFile: string;
  logFile: string;
  sshConfigFile: string;
}

export const APP_NAME = 'proxyswitch';

export function resolveAppPaths(
  env: Pick<Env, 'PROXYSWITCH_CONFIG_DIR' | 'PROXYSWITCH_DATA_DIR'>,
  homeDir: string = homedir(),
): AppPaths {
  const app = envPaths(APP_NAME, { suffix: '' });
  const configDir = env.PROXYSWITCH_CONFIG_DIR ?? app.config;
  const dataDir = env.PROXYSWITCH_DATA_DIR ?? app.data;
  const logsDir = join(dataDir, 'logs');

  return {
    configDir,
    dataDir,
    logsDir,
    homeDir,
    configFile: join(configDir, 'config.json'),
    stateFile: join(dataDir, 'state.json'),
    logFile: join(logsDir, `${APP_NAME}.log`),
    sshConfigFile: join(homeDir, '.ssh', 'config'),
  };
}

export async function ensureAppDirectories(paths: AppPaths): Promise<void> {
  await Promise.all([
    mkdir(paths.configDir, { recursive: true }),
    mkdir(paths.dataDir, { recursive: true }),
    mkdir(paths.logsDir, { recursive: true }),
  ]);
}
