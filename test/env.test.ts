import { afterEach, describe, expect, it, vi } from 'vitest';

import { resolveAppPaths } from '../src/appPaths';
import { loadEnv } from '../src/env';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadEnv', () => {
  it('applies defaults', () => {
    expect(loadEnv({})).toEqual({
      LOG_LEVEL: 'info',
      DEFAULT_NO_PROXY: 'localhost,127.0.0.1',
      DEFAULT_WPAD_URL: 'http://wpad.local/wpad.dat',
      PROXYSWITCH_CONFIG_DIR: undefined,
      PROXYSWITCH_DATA_DIR: undefined,
    });
  });

  it('drops blank directory overrides', () => {
    const env = loadEnv({ PROXYSWITCH_CONFIG_DIR: '  ', PROXYSWITCH_DATA_DIR: ' /srv/data ' });

    expect(env.PROXYSWITCH_CONFIG_DIR).toBeUndefined();
    expect(env.PROXYSWITCH_DATA_DIR).toBe('/srv/data');
  });

  it('rejects an unknown log level', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrowError('Invalid environment variables');
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});

describe('resolveAppPaths', () => {
  it('derives every path from the configured directories', () => {
    const paths = resolveAppPaths(
      { PROXYSWITCH_CONFIG_DIR: '/srv/config', PROXYSWITCH_DATA_DIR: '/srv/data' },
      '/home/tester',
    );

    expect(paths).toEqual({
      configDir: '/srv/config',
      dataDir: '/srv/data',
      logsDir: '/srv/data/logs',
      homeDir: '/home/tester',
      configFile: '/srv/config/config.json',
      stateFile: '/srv/data/state.json',
      logFile: '/srv/data/logs/proxyswitch.log',
      sshConfigFile: '/home/tester/.ssh/config',
    });
  });
});
