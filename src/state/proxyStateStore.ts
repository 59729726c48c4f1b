import { chmod } from 'node:fs/promises';

import { z } from 'zod';

import { IoError } from '../errors';
import type { ProxyKind } from '../proxy/proxyKinds';
import { readTextIfExists, writeText } from '../util/textFile';

const DEFAULT_STATE_VERSION = 1 as const;

export type ProxyValues = Partial<Record<ProxyKind, string>>;

export interface ProxyState {
  version: typeof DEFAULT_STATE_VERSION;
  values: ProxyValues;
  updatedAt: string;
}

const valuesSchema = z
  .object({
    http: z.string(),
    https: z.string(),
    ftp: z.string(),
    all: z.string(),
    rsync: z.string(),
    no_proxy: z.string(),
  })
  .partial();

const storedStateSchema = z.object({
  values: valuesSchema.catch({}),
  updatedAt: z.string().catch(() => new Date().toISOString()),
});

export class ProxyStateStore {
  public constructor(private readonly stateFilePath: string) {}

  public get path(): string {
    return this.stateFilePath;
  }

  public async read(): Promise<ProxyState> {
    const raw = await readTextIfExists(this.stateFilePath);
    if (raw === null) return this.defaultState();

    const parsed = storedStateSchema.parse(JSON.parse(raw));
    return {
      version: DEFAULT_STATE_VERSION,
      values: withoutEmpty(parsed.values),
      updatedAt: parsed.updatedAt,
    };
  }

  /** Replaces the whole record; kinds missing from `values` are cleared. */
  public async write(values: ProxyValues): Promise<ProxyState> {
    const next: ProxyState = {
      version: DEFAULT_STATE_VERSION,
      values: withoutEmpty(values),
      updatedAt: new Date().toISOString(),
    };

    await writeText(this.stateFilePath, `${JSON.stringify(next, null, 2)}\n`);
    if (process.platform !== 'win32') {
      try {
        await chmod(this.stateFilePath, 0o600);
      } catch (error) {
        throw new IoError('chmod', this.stateFilePath, error);
      }
    }
    return next;
  }

  public async clear(): Promise<ProxyState> {
    return this.write({});
  }

  private defaultState(): ProxyState {
    return {
      version: DEFAULT_STATE_VERSION,
      values: {},
      updatedAt: new Date().toISOString(),
    };
  }
}

function withoutEmpty(values: ProxyValues): ProxyValues {
  const result: ProxyValues = {};
  for (const [kind, value] of Object.entries(values)) {
    if (isProxyKind(kind) && value !== undefined && value.length > 0) {
      result[kind] = value;
    }
  }
  return result;
}

function isProxyKind(value: string): value is ProxyKind {
  return ['http', 'https', 'ftp', 'all', 'rsync', 'no_proxy'].includes(value);
}
