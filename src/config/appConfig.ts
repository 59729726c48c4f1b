import { join, resolve } from 'node:path';

import { z } from 'zod';

import { ConfigError } from '../errors';
import { readTextIfExists, writeText } from '../util/textFile';

function parseCommaSeparatedList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const noProxySchema = z
  .union([z.array(z.string().min(1)), z.string()])
  .nullable()
  .default(null)
  .transform((value) => (typeof value === 'string' ? parseCommaSeparatedList(value) : value));

const proxySettingsSchema = z
  .object({
    enableHttpProxy: z.boolean().default(true),
    enableHttpsProxy: z.boolean().default(true),
    enableFtpProxy: z.boolean().default(true),
    enableAllProxy: z.boolean().default(false),
    enableProxyRsync: z.boolean().default(false),
    enableNoProxy: z.boolean().default(true),
  })
  .default({});

const shellIntegrationSchema = z
  .object({
    detectShell: z.boolean().default(true),
    defaultShell: z.string().min(1).optional(),
    shells: z.array(z.string().min(1)).default([]),
    profilePaths: z.array(z.string().min(1)).default([]),
  })
  .default({});

const sshSettingsSchema = z
  .object({
    appendMissingHosts: z.boolean().default(false),
  })
  .default({});

export const appConfigSchema = z.object({
  defaultHostsFile: z.string().min(1).default('hosts'),
  noProxy: noProxySchema,
  enableWpadDiscovery: z.boolean().default(true),
  wpadUrl: z.string().url().optional(),
  defaultProxy: z.string().min(1).optional(),
  proxySettings: proxySettingsSchema,
  shellIntegration: shellIntegrationSchema,
  ssh: sshSettingsSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProxySettings = AppConfig['proxySettings'];

export function defaultAppConfig(): AppConfig {
  return appConfigSchema.parse({});
}

export function parseAppConfig(raw: string, path: string): AppConfig {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(path, error instanceof Error ? error.message : String(error));
  }

  const parsed = appConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(path, parsed.error.flatten());
  }
  return parsed.data;
}

export class AppConfigStore {
  public constructor(
    private readonly configDir: string,
    private readonly configFile: string = join(configDir, 'config.json'),
  ) {}

  public get path(): string {
    return this.configFile;
  }

  /** Missing file yields the defaults. */
  public async load(): Promise<AppConfig> {
    const raw = await readTextIfExists(this.configFile);
    if (raw === null) return defaultAppConfig();
    return parseAppConfig(raw, this.configFile);
  }

  public async save(config: AppConfig): Promise<void> {
    await writeText(this.configFile, `${JSON.stringify(config, null, 2)}\n`);
  }

  public hostsFilePath(config: AppConfig): string {
    return resolve(this.configDir, config.defaultHostsFile);
  }

  /** Writes the default config and an empty hosts file when they are missing. */
  public async initialize(): Promise<void> {
    if ((await readTextIfExists(this.configFile)) === null) {
      await this.save(defaultAppConfig());
    }

    const hostsPath = this.hostsFilePath(await this.load());
    if ((await readTextIfExists(hostsPath)) === null) {
      await writeText(hostsPath, '# Add proxy hosts here, one per line\n');
    }
  }
}
