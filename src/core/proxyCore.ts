import type pino from 'pino';

import { ensureAppDirectories, type AppPaths } from '../appPaths';
import { AppConfigStore, defaultAppConfig, type AppConfig, type ProxySettings } from '../config/appConfig';
import { WpadDiscovery, detectBestProxy, type ProxyDiscovery } from '../discovery/wpadDiscovery';
import { describeConfig, runDoctor, type DoctorReport } from '../doctor/doctor';
import type { Env } from '../env';
import { HostsParseError } from '../errors';
import { loadHostRegistry, type HostEntry } from '../hosts/hostRegistry';
import {
  PROXY_KINDS,
  clearEnvValue,
  exportLinesFor,
  readEnvValue,
  setEnvValue,
  type ProxyKind,
} from '../proxy/proxyKinds';
import { ProxyResolver } from '../proxy/proxyResolver';
import { parseProxyTarget, type ResolvedProxy } from '../proxy/proxyTarget';
import { ProfileSynchronizer, type ProfileSyncResult } from '../shell/profileSync';
import { resolveShellProfiles } from '../shell/shellProfiles';
import { SshConfigSynchronizer, type SshSyncOutcome } from '../ssh/sshConfigSync';
import { ProxyStateStore, type ProxyValues } from '../state/proxyStateStore';
import { FileLock } from '../util/fileLock';

export interface ProxyCoreOptions {
  paths: AppPaths;
  env: Env;
  logger: pino.Logger;
  processEnv?: NodeJS.ProcessEnv;
  fetchFn?: typeof fetch;
  discovery?: ProxyDiscovery;
  configStore?: AppConfigStore;
  stateStore?: ProxyStateStore;
  sshLock?: FileLock;
}

export interface EnableResult {
  resolved: ResolvedProxy;
  values: ProxyValues;
  profiles: ProfileSyncResult[];
}

const KIND_FLAGS: Record<Exclude<ProxyKind, 'no_proxy'>, keyof ProxySettings> = {
  http: 'enableHttpProxy',
  https: 'enableHttpsProxy',
  ftp: 'enableFtpProxy',
  all: 'enableAllProxy',
  rsync: 'enableProxyRsync',
};

function isKindEnabled(settings: ProxySettings, kind: ProxyKind): boolean {
  return kind === 'no_proxy' ? settings.enableNoProxy : settings[KIND_FLAGS[kind]];
}

/**
 * Coordinates the resolver and the synchronizers: environment variables,
 * shell profiles, state store and SSH config.
 */
export class ProxyCore {
  private readonly paths: AppPaths;
  private readonly env: Env;
  private readonly logger: pino.Logger;
  private readonly processEnv: NodeJS.ProcessEnv;
  private readonly configStore: AppConfigStore;
  private readonly stateStore: ProxyStateStore;
  private readonly profileSync: ProfileSynchronizer;
  private readonly sshLock: FileLock;

  public constructor(private readonly options: ProxyCoreOptions) {
    this.paths = options.paths;
    this.env = options.env;
    this.logger = options.logger;
    this.processEnv = options.processEnv ?? process.env;
    this.configStore =
      options.configStore ?? new AppConfigStore(this.paths.configDir, this.paths.configFile);
    this.stateStore = options.stateStore ?? new ProxyStateStore(this.paths.stateFile);
    this.profileSync = new ProfileSynchronizer({ logger: this.logger });
    this.sshLock = options.sshLock ?? new FileLock();
  }

  public async initialize(): Promise<void> {
    await ensureAppDirectories(this.paths);
    await this.configStore.initialize();
  }

  public async resolveProxy(explicit?: string): Promise<ResolvedProxy> {
    const config = await this.configStore.load();
    const resolver = new ProxyResolver({
      discovery: this.discoveryFor(config),
      logger: this.logger,
      defaultProxy: config.defaultProxy,
      env: this.processEnv,
    });
    return resolver.resolve(explicit);
  }

  public async enable(explicit?: string): Promise<EnableResult> {
    const resolved = await this.resolveProxy(explicit);
    const { values, profiles } = await this.applyProxy(resolved.url);
    return { resolved, values, profiles };
  }

  /** Exports `proxyUrl` for every enabled kind and persists the result. */
  public async applyProxy(
    proxyUrl: string,
  ): Promise<{ values: ProxyValues; profiles: ProfileSyncResult[] }> {
    const config = await this.configStore.load();
    const settings = config.proxySettings;
    const values: ProxyValues = {};

    for (const { kind } of PROXY_KINDS) {
      if (kind === 'no_proxy' || !isKindEnabled(settings, kind)) continue;
      values[kind] = proxyUrl;
    }
    if (settings.enableNoProxy) {
      values.no_proxy = this.noProxyValue(config);
    }

    const exportLines: string[] = [];
    for (const { kind } of PROXY_KINDS) {
      const value = values[kind];
      if (value === undefined) continue;
      setEnvValue(this.processEnv, kind, value);
      exportLines.push(...exportLinesFor(kind, value));
    }

    const profiles = await this.profileSync.writeBlock(this.shellProfiles(config), exportLines);
    await this.stateStore.write(values);

    this.logger.info({ kinds: Object.keys(values) }, 'proxy enabled');
    return { values, profiles };
  }

  public async disable(): Promise<ProfileSyncResult[]> {
    for (const { kind } of PROXY_KINDS) {
      clearEnvValue(this.processEnv, kind);
    }

    const config = await this.configStore.load();
    const profiles = await this.profileSync.removeBlock(this.shellProfiles(config));
    await this.stateStore.clear();

    this.logger.info('proxy disabled');
    return profiles;
  }

  public async status(): Promise<string[]> {
    const config = await this.configStore.load();
    const state = await this.stateStore.read();

    return PROXY_KINDS.filter(({ kind }) => isKindEnabled(config.proxySettings, kind)).map(
      ({ kind, label }) => {
        const value = state.values[kind] ?? readEnvValue(this.processEnv, kind);
        return `${label}: ${value ?? 'Not set'}`;
      },
    );
  }

  public async detect(): Promise<string> {
    const config = await this.configStore.load();
    return detectBestProxy(this.discoveryFor(config));
  }

  public async addSshHosts(proxy: ResolvedProxy, hostsFile?: string): Promise<SshSyncOutcome> {
    const config = await this.configStore.load();
    const entries = await this.canonicalHostEntries(hostsFile ?? this.hostsFilePath(config));
    return this.sshSynchronizer(config).add(entries, proxy.hostPort);
  }

  public async removeSshHosts(hostsFile?: string): Promise<SshSyncOutcome> {
    const config = await this.configStore.load();
    const entries = await loadHostRegistry(hostsFile ?? this.hostsFilePath(config));
    return this.sshSynchronizer(config).remove(entries);
  }

  public async doctor(): Promise<DoctorReport> {
    return runDoctor({ configStore: this.configStore, stateStore: this.stateStore });
  }

  public async describeConfig(): Promise<string[]> {
    return describeConfig(await this.configStore.load(), defaultAppConfig());
  }

  public async loadConfig(): Promise<AppConfig> {
    return this.configStore.load();
  }

  public hostsFilePath(config: AppConfig): string {
    return this.configStore.hostsFilePath(config);
  }

  /** Overrides become `host:port` so that conflicts compare canonical values. */
  private async canonicalHostEntries(path: string): Promise<HostEntry[]> {
    const entries = await loadHostRegistry(path);
    return entries.map((entry) => {
      if (entry.proxyOverride === undefined) return entry;

      const hostPort = parseProxyTarget(entry.proxyOverride);
      if (!hostPort) {
        throw new HostsParseError(
          path,
          entry.line,
          `invalid proxy value '${entry.proxyOverride}' for '${entry.pattern}'`,
        );
      }
      return { ...entry, proxyOverride: hostPort };
    });
  }

  private sshSynchronizer(config: AppConfig): SshConfigSynchronizer {
    return new SshConfigSynchronizer({
      configPath: this.paths.sshConfigFile,
      logger: this.logger,
      appendMissing: config.ssh.appendMissingHosts,
      lock: this.sshLock,
    });
  }

  private shellProfiles(config: AppConfig): string[] {
    return resolveShellProfiles(config.shellIntegration, {
      home: this.paths.homeDir,
      env: this.processEnv,
    });
  }

  private noProxyValue(config: AppConfig): string {
    const custom = config.noProxy;
    return custom && custom.length > 0 ? custom.join(',') : this.env.DEFAULT_NO_PROXY;
  }

  private discoveryFor(config: AppConfig): ProxyDiscovery {
    return this.options.discovery ?? new WpadDiscovery(this.wpadOptions(config));
  }

  private wpadOptions(config: AppConfig): ConstructorParameters<typeof WpadDiscovery>[0] {
    return {
      url: config.wpadUrl ?? this.env.DEFAULT_WPAD_URL,
      enabled: config.enableWpadDiscovery,
      logger: this.logger,
      ...(this.options.fetchFn ? { fetchFn: this.options.fetchFn } : {}),
    };
  }
}
