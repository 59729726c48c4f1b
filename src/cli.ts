#!/usr/bin/env node

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { resolveAppPaths } from './appPaths';
import { ProxyCore } from './core/proxyCore';
import { loadEnv } from './env';
import { toErrorMessage } from './errors';
import { createLogger } from './logger';

async function main(): Promise<void> {
  dotenv.config();

  const env = loadEnv();
  const paths = resolveAppPaths(env);
  const logger = createLogger(paths.logFile, env.LOG_LEVEL);
  const core = new ProxyCore({ paths, env, logger });

  await core.initialize();

  async function run(command: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      logger.error({ command, error: toErrorMessage(error) }, 'command failed');
      throw error;
    }
  }

  async function commandProxyOn(proxy?: string): Promise<void> {
    const result = await core.enable(proxy);
    console.log(`Proxy enabled: ${result.resolved.url} (${result.resolved.source})`);
  }

  async function commandProxyOff(): Promise<void> {
    await core.disable();
    console.log('Proxy disabled');
  }

  async function commandOn(proxy?: string): Promise<void> {
    const result = await core.enable(proxy);
    await core.addSshHosts(result.resolved);
    console.log('Proxy enabled and SSH hosts added');
  }

  async function commandOff(): Promise<void> {
    await core.disable();
    await core.removeSshHosts();
    console.log('Proxy disabled and SSH hosts removed');
  }

  async function commandSshAdd(hostsFile?: string): Promise<void> {
    const resolved = await core.resolveProxy();
    const outcome = await core.addSshHosts(resolved, hostsFile);
    const source = hostsFile ?? core.hostsFilePath(await core.loadConfig());
    console.log(
      outcome.changed ? `SSH hosts added from ${source}` : 'SSH config already up to date',
    );
  }

  async function commandSshRemove(hostsFile?: string): Promise<void> {
    const outcome = await core.removeSshHosts(hostsFile);
    console.log(outcome.changed ? 'SSH hosts removed' : 'No SSH hosts to remove');
  }

  async function commandDetect(): Promise<void> {
    console.log(`Best regional proxy: ${await core.detect()}`);
  }

  async function commandStatus(): Promise<void> {
    for (const line of await core.status()) {
      console.log(line);
    }
  }

  async function commandDoctor(action: 'run' | 'config'): Promise<void> {
    if (action === 'config') {
      for (const line of await core.describeConfig()) {
        console.log(line);
      }
      return;
    }

    const report = await core.doctor();
    for (const line of report.lines) {
      console.log(line);
    }
    if (!report.healthy) {
      process.exitCode = 1;
    }
  }

  await yargs(hideBin(process.argv))
    .scriptName('proxyswitch')
    .strict()
    .command(
      'on',
      'Enable the proxy and add SSH hosts',
      (builder) =>
        builder.option('proxy', {
          type: 'string',
          describe: 'Proxy URL or host:port to use instead of discovery',
        }),
      async (argv) => {
        await run('on', () => commandOn(argv.proxy));
      },
    )
    .command(
      'off',
      'Disable the proxy and remove SSH hosts',
      () => undefined,
      async () => {
        await run('off', commandOff);
      },
    )
    .command(
      'proxy <action>',
      'Enable or disable proxy environment variables only',
      (builder) =>
        builder
          .positional('action', {
            type: 'string',
            choices: ['on', 'off'] as const,
            demandOption: true,
          })
          .option('proxy', {
            type: 'string',
            describe: 'Proxy URL or host:port to use instead of discovery',
          }),
      async (argv) => {
        await run(`proxy ${argv.action}`, () =>
          argv.action === 'on' ? commandProxyOn(argv.proxy) : commandProxyOff(),
        );
      },
    )
    .command(
      'ssh <action>',
      'Add or remove ProxyCommand directives in ~/.ssh/config',
      (builder) =>
        builder
          .positional('action', {
            type: 'string',
            choices: ['add', 'remove'] as const,
            demandOption: true,
          })
          .option('hosts-file', {
            type: 'string',
            describe: 'Hosts file to read instead of the configured one',
          }),
      async (argv) => {
        await run(`ssh ${argv.action}`, () =>
          argv.action === 'add'
            ? commandSshAdd(argv['hosts-file'])
            : commandSshRemove(argv['hosts-file']),
        );
      },
    )
    .command(
      'detect',
      'Detect the best proxy through WPAD',
      () => undefined,
      async () => {
        await run('detect', commandDetect);
      },
    )
    .command(
      'status',
      'Show proxy variables per kind',
      () => undefined,
      async () => {
        await run('status', commandStatus);
      },
    )
    .command(
      'doctor [action]',
      'Check configuration and state, or print the effective configuration',
      (builder) =>
        builder.positional('action', {
          type: 'string',
          choices: ['run', 'config'] as const,
          default: 'run' as const,
        }),
      async (argv) => {
        await run(`doctor ${argv.action}`, () => commandDoctor(argv.action));
      },
    )
    .demandCommand(1)
    .fail((message: string | undefined, error: Error | undefined) => {
      const reason = message ?? toErrorMessage(error);
      if (reason) {
        console.error(reason);
      }
      process.exit(1);
    })
    .help()
    .parseAsync();
}

void main().catch((error) => {
  console.error(toErrorMessage(error));
  process.exit(1);
});
