import type pino from 'pino';

import { readTextIfExists, writeText } from '../util/textFile';

import { renderManagedBlock, stripManagedBlock } from './managedBlock';

export interface ProfileSyncResult {
  path: string;
  changed: boolean;
}

interface ProfileSynchronizerOptions {
  logger: pino.Logger;
}

/**
 * Maintains the managed export block in shell profiles. Each file is handled
 * on its own: all files are attempted, and the first failure is rethrown once
 * every file has been tried.
 */
export class ProfileSynchronizer {
  public constructor(private readonly options: ProfileSynchronizerOptions) {}

  public async writeBlock(
    profilePaths: readonly string[],
    exportLines: readonly string[],
  ): Promise<ProfileSyncResult[]> {
    if (exportLines.length === 0) return this.removeBlock(profilePaths);

    return this.forEachProfile(profilePaths, async (path) => {
      const existing = (await readTextIfExists(path)) ?? '';
      const next = renderManagedBlock(stripManagedBlock(existing).content, exportLines);
      if (next === existing) return false;

      await writeText(path, next);
      return true;
    });
  }

  public async removeBlock(profilePaths: readonly string[]): Promise<ProfileSyncResult[]> {
    return this.forEachProfile(profilePaths, async (path) => {
      const existing = await readTextIfExists(path);
      if (existing === null) return false;

      const stripped = stripManagedBlock(existing);
      if (!stripped.changed) return false;

      await writeText(path, stripped.content);
      return true;
    });
  }

  private async forEachProfile(
    profilePaths: readonly string[],
    apply: (path: string) => Promise<boolean>,
  ): Promise<ProfileSyncResult[]> {
    const results: ProfileSyncResult[] = [];
    let firstError: unknown;

    for (const path of profilePaths) {
      try {
        const changed = await apply(path);
        results.push({ path, changed });
        if (changed) this.options.logger.info({ path }, 'shell profile updated');
      } catch (error) {
        this.options.logger.error(
          { path, error: error instanceof Error ? error.message : String(error) },
          'shell profile update failed',
        );
        firstError ??= error;
      }
    }

    if (firstError !== undefined) throw firstError;
    return results;
  }
}
