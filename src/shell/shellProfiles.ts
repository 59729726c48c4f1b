import { existsSync } from 'node:fs';
import { basename, isAbsolute, join } from 'node:path';

export interface ShellIntegration {
  detectShell: boolean;
  defaultShell?: string | undefined;
  shells: string[];
  profilePaths: string[];
}

interface ProfileLookup {
  home: string;
  env?: NodeJS.ProcessEnv;
  exists?: (path: string) => boolean;
}

const SHELL_PROFILES: Record<string, readonly string[]> = {
  zsh: ['.zshenv', '.zprofile', '.zshrc'],
  bash: ['.bash_profile', '.bashrc'],
};

function expandProfilePath(value: string, home: string): string {
  const trimmed = value.trim();
  if (trimmed.startsWith('~/')) return join(home, trimmed.slice(2));
  return isAbsolute(trimmed) ? trimmed : join(home, trimmed);
}

function selectProfile(
  candidates: readonly string[],
  home: string,
  exists: (path: string) => boolean,
): string | null {
  const paths = candidates.map((candidate) => join(home, candidate));
  return paths.find((path) => exists(path)) ?? paths[0] ?? null;
}

/**
 * Turns shell-integration settings into the ordered, de-duplicated list of
 * profile files to edit. Explicit paths come first, then one profile per
 * known shell (`zsh`, `bash`); unknown shells contribute nothing.
 */
export function resolveShellProfiles(
  integration: ShellIntegration,
  lookup: ProfileLookup,
): string[] {
  const env = lookup.env ?? process.env;
  const exists = lookup.exists ?? existsSync;
  const profiles: string[] = [];

  const push = (path: string): void => {
    if (!profiles.includes(path)) profiles.push(path);
  };

  for (const path of integration.profilePaths) {
    if (path.trim().length > 0) push(expandProfilePath(path, lookup.home));
  }

  const shellNames: string[] = [];
  const addShell = (name: string | undefined): void => {
    const normalized = name?.trim().toLowerCase();
    if (normalized && !shellNames.includes(normalized)) shellNames.push(normalized);
  };

  if (integration.detectShell) {
    const shell = env.SHELL?.trim();
    if (shell) addShell(basename(shell));
  }
  integration.shells.forEach(addShell);
  addShell(integration.defaultShell);

  for (const shell of shellNames) {
    const candidates = SHELL_PROFILES[shell];
    if (!candidates) continue;
    const profile = selectProfile(candidates, lookup.home, exists);
    if (profile) push(profile);
  }

  return profiles;
}
