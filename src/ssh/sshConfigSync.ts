import type pino from 'pino';

import type { HostEntry } from '../hosts/hostRegistry';
import { FileLock } from '../util/fileLock';
import { copyText, readTextIfExists, writeText } from '../util/textFile';

import { applyProxyCommands, removeProxyCommands, type SyncResult } from './sshConfigDocument';

export const BACKUP_SUFFIX = '.proxyswitch.bak';

interface SshConfigSynchronizerOptions {
  configPath: string;
  logger: pino.Logger;
  appendMissing?: boolean;
  lock?: FileLock;
}

export interface SshSyncOutcome extends SyncResult {
  backupPath: string | null;
}

export class SshConfigSynchronizer {
  private readonly lock: FileLock;

  public constructor(private readonly options: SshConfigSynchronizerOptions) {
    this.lock = options.lock ?? new FileLock();
  }

  public get backupPath(): string {
    return `${this.options.configPath}${BACKUP_SUFFIX}`;
  }

  public async add(entries: readonly HostEntry[], defaultProxy: string): Promise<SshSyncOutcome> {
    return this.lock.runExclusive(async () => {
      const existing = await readTextIfExists(this.options.configPath);
      const result = applyProxyCommands(existing ?? '', entries, defaultProxy, {
        appendMissing: this.options.appendMissing ?? false,
      });

      if (!result.changed) {
        this.options.logger.debug({ path: this.options.configPath }, 'ssh config already up to date');
        return { ...result, backupPath: null };
      }

      const backupPath = existing === null ? null : await this.backup();
      await writeText(this.options.configPath, result.text);

      this.options.logger.info(
        { path: this.options.configPath, backupPath, proxy: defaultProxy, hosts: entries.length },
        'ssh config proxy commands applied',
      );
      return { ...result, backupPath };
    });
  }

  public async remove(entries: readonly HostEntry[]): Promise<SshSyncOutcome> {
    return this.lock.runExclusive(async () => {
      const existing = await readTextIfExists(this.options.configPath);
      if (existing === null) {
        return { text: '', changed: false, backupPath: null };
      }

      const backupPath = entries.length > 0 ? await this.backup() : null;
      const result = removeProxyCommands(existing, entries);

      if (result.changed) {
        await writeText(this.options.configPath, result.text);
        this.options.logger.info(
          { path: this.options.configPath, backupPath },
          'ssh config proxy commands removed',
        );
      }

      return { ...result, backupPath };
    });
  }

  private async backup(): Promise<string> {
    await copyText(this.options.configPath, this.backupPath);
    return this.backupPath;
  }
}
