export { ProxyCore } from './core/proxyCore';
export type { EnableResult, ProxyCoreOptions } from './core/proxyCore';
export {
  ConfigError,
  DiscoveryError,
  HostConflictError,
  HostsParseError,
  IoError,
  ProxySwitchError,
  ResolutionError,
  formatProxySwitchError,
} from './errors';
export type { ProxySwitchErrorCode } from './errors';
export { ProxyResolver } from './proxy/proxyResolver';
export { parseProxyTarget, toHostPort } from './proxy/proxyTarget';
export type { ProxySource, ResolvedProxy } from './proxy/proxyTarget';
export { WpadDiscovery, detectBestProxy } from './discovery/wpadDiscovery';
export type { ProxyDiscovery } from './discovery/wpadDiscovery';
export { extractPacCandidates } from './discovery/pacCandidates';
export { loadHostRegistry, parseHostsText } from './hosts/hostRegistry';
export type { HostEntry } from './hosts/hostRegistry';
export { applyProxyCommands, removeProxyCommands } from './ssh/sshConfigDocument';
export { SshConfigSynchronizer } from './ssh/sshConfigSync';
export { ProfileSynchronizer } from './shell/profileSync';
export { appConfigSchema } from './config/appConfig';
export type { AppConfig } from './config/appConfig';
