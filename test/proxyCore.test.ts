import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, describe, expect, it, vi } from 'vitest';

import type { AppPaths } from '../src/appPaths';
import { AppConfigStore, defaultAppConfig } from '../src/config/appConfig';
import { ProxyCore } from '../src/core/proxyCore';
import type { ProxyDiscovery } from '../src/discovery/wpadDiscovery';
import { HostsParseError } from '../src/errors';
import { loadEnv } from '../src/env';
import { createSilentLogger } from '../src/logger';
import { MANAGED_END, MANAGED_START } from '../src/shell/managedBlock';
import { proxyCommandFor } from '../src/ssh/sshConfigDocument';

const tempPaths: string[] = [];
const PROXY_URL = 'http://proxy.test:3128';

afterEach(async () => {
  while (tempPaths.length > 0) {
    const path = tempPaths.pop();
    if (!path) continue;
    await rm(path, { recursive: true, force: true });
  }
});

async function createCore(
  overrides: { fetchFn?: typeof fetch; discovery?: ProxyDiscovery } = {},
): Promise<{ core: ProxyCore; paths: AppPaths; processEnv: NodeJS.ProcessEnv }> {
  const root = await mkdtemp(join(tmpdir(), 'proxyswitch-core-'));
  tempPaths.push(root);

  const homeDir = join(root, 'home');
  const configDir = join(root, 'config');
  const dataDir = join(root, 'data');
  const paths: AppPaths = {
    configDir,
    dataDir,
    logsDir: join(dataDir, 'logs'),
    homeDir,
    configFile: join(configDir, 'config.json'),
    stateFile: join(dataDir, 'state.json'),
    logFile: join(dataDir, 'logs', 'proxyswitch.log'),
    sshConfigFile: join(homeDir, '.ssh', 'config'),
  };
  const processEnv: NodeJS.ProcessEnv = { SHELL: '/bin/bash' };

  const core = new ProxyCore({
    paths,
    env: loadEnv({}),
    logger: createSilentLogger(),
    processEnv,
    ...overrides,
  });
  await core.initialize();

  return { core, paths, processEnv };
}

describe('ProxyCore', () => {
  it('exports the proxy for enabled kinds', async () => {
    const { core, paths, processEnv } = await createCore();

    const result = await core.enable(PROXY_URL);

    expect(result.resolved.source).toBe('explicit');
    expect(result.values).toEqual({
      http: PROXY_URL,
      https: PROXY_URL,
      ftp: PROXY_URL,
      no_proxy: 'localhost,127.0.0.1',
    });
    expect(processEnv.http_proxy).toBe(PROXY_URL);
    expect(processEnv.HTTPS_PROXY).toBe(PROXY_URL);
    expect(processEnv.all_proxy).toBeUndefined();
    expect(processEnv.NO_PROXY).toBe('localhost,127.0.0.1');

    await expect(readFile(join(paths.homeDir, '.bash_profile'), 'utf8')).resolves.toBe(
      [
        MANAGED_START,
        `export http_proxy="${PROXY_URL}"`,
        `export HTTP_PROXY="${PROXY_URL}"`,
        `export https_proxy="${PROXY_URL}"`,
        `export HTTPS_PROXY="${PROXY_URL}"`,
        `export ftp_proxy="${PROXY_URL}"`,
        `export FTP_PROXY="${PROXY_URL}"`,
        'export no_proxy="localhost,127.0.0.1"',
        'export NO_PROXY="localhost,127.0.0.1"',
        MANAGED_END,
        '',
      ].join('\n'),
    );

    await expect(core.status()).resolves.toEqual([
      `HTTP Proxy: ${PROXY_URL}`,
      `HTTPS Proxy: ${PROXY_URL}`,
      `FTP Proxy: ${PROXY_URL}`,
      'No Proxy: localhost,127.0.0.1',
    ]);
  });

  it('uses the configured no-proxy list', async () => {
    const { core, paths } = await createCore();
    await new AppConfigStore(paths.configDir).save({
      ...defaultAppConfig(),
      noProxy: ['.corp.test', '10.0.0.0/8'],
      proxySettings: { ...defaultAppConfig().proxySettings, enableFtpProxy: false },
    });

    const { values } = await core.applyProxy(PROXY_URL);

    expect(values).toEqual({
      http: PROXY_URL,
      https: PROXY_URL,
      no_proxy: '.corp.test,10.0.0.0/8',
    });
  });

  it('clears variables, profile block and state on disable', async () => {
    const { core, paths, processEnv } = await createCore();
    await core.enable(PROXY_URL);

    await core.disable();

    expect(processEnv.http_proxy).toBeUndefined();
    expect(processEnv.NO_PROXY).toBeUndefined();
    await expect(readFile(join(paths.homeDir, '.bash_profile'), 'utf8')).resolves.toBe('');
    await expect(core.status()).resolves.toEqual([
      'HTTP Proxy: Not set',
      'HTTPS Proxy: Not set',
      'FTP Proxy: Not set',
      'No Proxy: Not set',
    ]);
  });

  it('falls back to the configured default proxy', async () => {
    const { core, paths } = await createCore();
    await new AppConfigStore(paths.configDir).save({
      ...defaultAppConfig(),
      enableWpadDiscovery: false,
      defaultProxy: 'fallback.test:8080',
    });

    await expect(core.resolveProxy()).resolves.toEqual({
      url: 'fallback.test:8080',
      hostPort: 'fallback.test:8080',
      source: 'fallback',
    });
  });

  it('adds and removes SSH directives with canonical overrides', async () => {
    const { core, paths } = await createCore();
    const original = 'Host github.com\n    User git\n\nHost corp.example\n    User me\n';
    await writeFile(
      join(paths.configDir, 'hosts'),
      'github.com\ncorp.example proxy=http://corp.test:8080\n',
      'utf8',
    );
    await mkdir(join(paths.homeDir, '.ssh'), { recursive: true });
    await writeFile(paths.sshConfigFile, original, 'utf8');

    const resolved = await core.resolveProxy(PROXY_URL);
    const added = await core.addSshHosts(resolved);

    expect(added.changed).toBe(true);
    await expect(readFile(paths.sshConfigFile, 'utf8')).resolves.toBe(
      [
        'Host github.com',
        `    ${proxyCommandFor('proxy.test:3128')}`,
        '    User git',
        '',
        'Host corp.example',
        `    ${proxyCommandFor('corp.test:8080')}`,
        '    User me',
        '',
      ].join('\n'),
    );

    const removed = await core.removeSshHosts();

    expect(removed.changed).toBe(true);
    await expect(readFile(paths.sshConfigFile, 'utf8')).resolves.toBe(original);
  });

  it('reads SSH hosts from an explicit hosts file', async () => {
    const { core, paths } = await createCore();
    const hostsFile = join(paths.dataDir, 'extra-hosts');
    await writeFile(hostsFile, 'extra.test\n', 'utf8');
    await mkdir(join(paths.homeDir, '.ssh'), { recursive: true });
    await writeFile(paths.sshConfigFile, 'Host extra.test\n', 'utf8');

    await core.addSshHosts(await core.resolveProxy(PROXY_URL), hostsFile);

    await expect(readFile(paths.sshConfigFile, 'utf8')).resolves.toBe(
      `Host extra.test\n    ${proxyCommandFor('proxy.test:3128')}\n`,
    );
  });

  it('reports an invalid override with the hosts file line on add', async () => {
    const { core, paths } = await createCore();
    const hostsFile = join(paths.configDir, 'hosts');
    await writeFile(hostsFile, 'ok.test\nbad.test proxy=DIRECT\n', 'utf8');

    const adding = core.addSshHosts(await core.resolveProxy(PROXY_URL), hostsFile);

    await expect(adding).rejects.toBeInstanceOf(HostsParseError);
    await expect(adding).rejects.toThrowError(
      `${hostsFile}:2: invalid proxy value 'DIRECT' for 'bad.test'`,
    );
  });

  it('removes SSH directives even when an override is invalid', async () => {
    const { core, paths } = await createCore();
    await writeFile(
      join(paths.configDir, 'hosts'),
      'ok.test\nbad.test proxy=DIRECT\n',
      'utf8',
    );
    await mkdir(join(paths.homeDir, '.ssh'), { recursive: true });
    await writeFile(
      paths.sshConfigFile,
      `Host ok.test\n    ${proxyCommandFor('proxy.test:3128')}\n`,
      'utf8',
    );

    const removed = await core.removeSshHosts();

    expect(removed.changed).toBe(true);
    await expect(readFile(paths.sshConfigFile, 'utf8')).resolves.toBe('Host ok.test\n');
  });

  it('detects through an injected discovery', async () => {
    const discovery = {
      enabled: true,
      discoverCandidates: vi.fn(async () => ['injected.test:8080', 'other.test:8080']),
    };
    const { core } = await createCore({ discovery });

    await expect(core.detect()).resolves.toBe('injected.test:8080');
    expect(discovery.discoverCandidates).toHaveBeenCalledTimes(1);
  });

  it('detects the best proxy through WPAD', async () => {
    const fetchFn = vi.fn(async () => new Response('PROXY best.test:3128; PROXY next.test:3128'));
    const { core } = await createCore({ fetchFn });

    await expect(core.detect()).resolves.toBe('best.test:3128');
    expect(fetchFn).toHaveBeenCalledWith('http://wpad.local/wpad.dat', {
      method: 'GET',
      headers: { noproxy: '*' },
    });
  });

  it('reports health and settings', async () => {
    const { core } = await createCore();

    await expect(core.doctor()).resolves.toMatchObject({ healthy: true });
    await expect(core.describeConfig()).resolves.toContain(
      'defaultHostsFile = "hosts"  # (string)',
    );
  });
});
