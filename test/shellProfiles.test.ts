import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { resolveShellProfiles, type ShellIntegration } from '../src/shell/shellProfiles';

const HOME = '/home/tester';

function integration(overrides: Partial<ShellIntegration> = {}): ShellIntegration {
  return { detectShell: true, shells: [], profilePaths: [], ...overrides };
}

describe('resolveShellProfiles', () => {
  it('picks the first existing zsh profile of the detected shell', () => {
    const profiles = resolveShellProfiles(integration(), {
      home: HOME,
      env: { SHELL: '/bin/zsh' },
      exists: (path) => path === join(HOME, '.zshrc'),
    });

    expect(profiles).toEqual([join(HOME, '.zshrc')]);
  });

  it('falls back to the first candidate when none exists', () => {
    const profiles = resolveShellProfiles(integration(), {
      home: HOME,
      env: { SHELL: '/usr/bin/zsh' },
      exists: () => false,
    });

    expect(profiles).toEqual([join(HOME, '.zshenv')]);
  });

  it('puts explicit paths first and expands them against home', () => {
    const profiles = resolveShellProfiles(
      integration({
        detectShell: false,
        shells: ['bash'],
        profilePaths: ['~/.custom_profile', '/etc/profile.d/proxy.sh', 'rel/profile'],
      }),
      { home: HOME, env: { SHELL: '/bin/zsh' }, exists: () => false },
    );

    expect(profiles).toEqual([
      join(HOME, '.custom_profile'),
      '/etc/profile.d/proxy.sh',
      join(HOME, 'rel/profile'),
      join(HOME, '.bash_profile'),
    ]);
  });

  it('ignores unknown shells and drops duplicates', () => {
    const profiles = resolveShellProfiles(
      integration({ shells: ['fish', 'BASH'], defaultShell: 'bash', profilePaths: ['~/.bashrc'] }),
      { home: HOME, env: {}, exists: (path) => path === join(HOME, '.bashrc') },
    );

    expect(profiles).toEqual([join(HOME, '.bashrc')]);
  });
});
