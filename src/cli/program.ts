/**
 * playpush CLI - builds Google Play push configs from pushapk tasks
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadScriptConfig } from '../config/ScriptConfig.js';
import { loadTask } from '../task/Task.js';
import { craftPushApkConfig, isDryFixtureAccount, resolvePackageName } from '../googleplay/PushConfigBuilder.js';
import { UnsupportedChannelError, formatError } from '../errors/PlayPushError.js';
import { createLogger } from '../logger/index.js';
import type { CredentialsTable } from '../types/index.js';

const VERSION = '0.1.0';

const log = createLogger('cli');

// ─── Output helpers ──────────────────────────────────────────────────

type OutputOptions = {
  format?: string;
};

function output(data: unknown, opts: OutputOptions): void {
  if (opts.format === 'table') {
    if (Array.isArray(data)) {
      if (data.length === 0) {
        console.log('(no results)');
        return;
      }
      console.table(data);
    } else if (data !== null && typeof data === 'object') {
      console.table(Object.entries(data).map(([key, value]) => ({ key, value })));
    } else {
      console.log(String(data));
    }
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

function fail(err: unknown): void {
  log.debug({ err }, 'Command failed');
  console.error(formatError(err));
  process.exitCode = 1;
}

// ─── Option parsers ──────────────────────────────────────────────────

export function collectApk(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError(`Expected <arch>=<path>, got "${value}".`);
  }
  const architecture = value.slice(0, separator);
  if (Object.hasOwn(previous, architecture)) {
    throw new InvalidArgumentError(`Architecture "${architecture}" given more than once.`);
  }
  return { ...previous, [architecture]: value.slice(separator + 1) };
}

// ─── Program ─────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('playpush')
    .description('Resolve pushapk tasks into per-channel Google Play push configurations')
    .version(VERSION)
    .addOption(new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json'));

  // ─── craft command ───────────────────────────────────────────────────

  program
    .command('craft')
    .description('Build the push config for a task and print it')
    .option('--config <path>', 'Script config file (defaults to $PLAYPUSH_CONFIG)')
    .requiredOption('--task <path>', 'Task definition file (JSON with scopes and payload)')
    .option('--apk <arch=path>', 'APK for an architecture, repeatable', collectApk, {})
    .action(async (opts: { config?: string; task: string; apk: Record<string, string> }) => {
      try {
        const config = await loadScriptConfig(opts.config);
        const task = await loadTask(opts.task);
        const pushConfig = craftPushApkConfig({
          accounts: config.google_play_accounts,
          task,
          apks: opts.apk,
          scopePrefix: config.taskcluster_scope_prefix,
        });
        output(pushConfig, program.opts<OutputOptions>());
      } catch (err) {
        fail(err);
      }
    });

  // ─── channels command ────────────────────────────────────────────────

  program
    .command('channels')
    .description('List configured channels and their Google Play packages')
    .option('--config <path>', 'Script config file (defaults to $PLAYPUSH_CONFIG)')
    .action(async (opts: { config?: string }) => {
      try {
        const config = await loadScriptConfig(opts.config);
        const accounts: CredentialsTable = config.google_play_accounts ?? {};
        const rows = Object.entries(accounts).map(([channel, credentials]) => {
          let packageName: string;
          try {
            packageName = resolvePackageName(credentials, channel);
          } catch (err) {
            if (!(err instanceof UnsupportedChannelError)) throw err;
            packageName = '(unsupported)';
          }
          return {
            channel,
            service_account: credentials.service_account,
            package_name: packageName,
            contacts_google_play: isDryFixtureAccount(credentials) ? 'no' : 'yes',
          };
        });
        output(rows, program.opts<OutputOptions>());
      } catch (err) {
        fail(err);
      }
    });

  return program;
}
