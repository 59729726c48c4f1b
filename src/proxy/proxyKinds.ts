export type ProxyKind = 'http' | 'https' | 'ftp' | 'all' | 'rsync' | 'no_proxy';

export interface ProxyKindDefinition {
  kind: ProxyKind;
  label: string;
  keys: readonly [string, string];
}

export const PROXY_KINDS: readonly ProxyKindDefinition[] = [
  { kind: 'http', label: 'HTTP Proxy', keys: ['http_proxy', 'HTTP_PROXY'] },
  { kind: 'https', label: 'HTTPS Proxy', keys: ['https_proxy', 'HTTPS_PROXY'] },
  { kind: 'ftp', label: 'FTP Proxy', keys: ['ftp_proxy', 'FTP_PROXY'] },
  { kind: 'all', label: 'All Proxy', keys: ['all_proxy', 'ALL_PROXY'] },
  { kind: 'rsync', label: 'Proxy Rsync', keys: ['proxy_rsync', 'PROXY_RSYNC'] },
  { kind: 'no_proxy', label: 'No Proxy', keys: ['no_proxy', 'NO_PROXY'] },
];

// Order in which an already-exported proxy is picked up by the resolver.
export const ENV_LOOKUP_ORDER: readonly ProxyKind[] = ['https', 'http', 'all', 'ftp', 'rsync'];

export function keysFor(kind: ProxyKind): readonly [string, string] {
  const definition = PROXY_KINDS.find((item) => item.kind === kind);
  if (!definition) throw new Error(`Unknown proxy kind: ${kind}`);
  return definition.keys;
}

export function readEnvValue(env: NodeJS.ProcessEnv, kind: ProxyKind): string | undefined {
  for (const key of keysFor(kind)) {
    const value = env[key];
    if (value !== undefined && value.length > 0) return value;
  }
  return undefined;
}

export function setEnvValue(env: NodeJS.ProcessEnv, kind: ProxyKind, value: string): void {
  for (const key of keysFor(kind)) {
    env[key] = value;
  }
}

export function clearEnvValue(env: NodeJS.ProcessEnv, kind: ProxyKind): void {
  for (const key of keysFor(kind)) {
    delete env[key];
  }
}

export function exportLinesFor(kind: ProxyKind, value: string): string[] {
  return keysFor(kind).map((key) => `export ${key}="${value}"`);
}
