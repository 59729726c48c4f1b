import { access } from 'node:fs/promises';

import type { AppConfig, AppConfigStore } from '../config/appConfig';
import { toErrorMessage } from '../errors';
import type { ProxyStateStore } from '../state/proxyStateStore';

export interface DoctorReport {
  lines: string[];
  healthy: boolean;
}

interface DoctorDeps {
  configStore: AppConfigStore;
  stateStore: ProxyStateStore;
}

async function checkConfig(configStore: AppConfigStore): Promise<string> {
  const config = await configStore.load();
  const hostsPath = configStore.hostsFilePath(config);

  try {
    await access(hostsPath);
  } catch {
    throw new Error(`expected hosts file at ${hostsPath}`);
  }

  return `configuration file at ${configStore.path} parsed successfully`;
}

async function checkState(stateStore: ProxyStateStore): Promise<string> {
  await stateStore.read();
  return `state file at ${stateStore.path} readable`;
}

export async function runDoctor(deps: DoctorDeps): Promise<DoctorReport> {
  const checks: [string, () => Promise<string>][] = [
    ['Config', () => checkConfig(deps.configStore)],
    ['State', () => checkState(deps.stateStore)],
  ];

  const lines: string[] = [];
  let healthy = true;

  for (const [label, check] of checks) {
    try {
      lines.push(`${label}: OK - ${await check()}`);
    } catch (error) {
      healthy = false;
      lines.push(`${label}: ERR - ${toErrorMessage(error)}`);
    }
  }

  lines.push(
    healthy ? 'Doctor summary: all checks passed' : 'Doctor summary: issues detected',
  );
  return { lines, healthy };
}

type JsonLeaf = string | number | boolean | null | unknown[];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'string';
  if (Array.isArray(value)) return 'array';
  return 'table';
}

function flatten(
  value: Record<string, unknown>,
  prefix: string,
  into: Map<string, JsonLeaf | undefined>,
): void {
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(child)) {
      flatten(child, path, into);
    } else if (
      child === null ||
      child === undefined ||
      Array.isArray(child) ||
      typeof child === 'string' ||
      typeof child === 'number' ||
      typeof child === 'boolean'
    ) {
      into.set(path, child);
    }
  }
}

/**
 * Renders the effective settings one key per line, with the expected type and
 * the default value wherever the current value differs from it.
 */
export function describeConfig(current: AppConfig, defaults: AppConfig): string[] {
  const currentValues = new Map<string, JsonLeaf | undefined>();
  const defaultValues = new Map<string, JsonLeaf | undefined>();
  flatten(current, '', currentValues);
  flatten(defaults, '', defaultValues);

  const lines: string[] = [];
  for (const [path, value] of currentValues) {
    if (value === undefined) continue;
    const fallback = defaultValues.get(path);
    const sample = fallback === null || fallback === undefined ? value : fallback;

    let line = `${path} = ${JSON.stringify(value)}  # (${describeType(sample)})`;
    if (
      fallback !== null &&
      fallback !== undefined &&
      JSON.stringify(fallback) !== JSON.stringify(value)
    ) {
      line += ` [${JSON.stringify(fallback)}]`;
    }
    lines.push(line);
  }
  return lines;
}
