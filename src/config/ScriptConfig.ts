/**
 * ScriptConfig — Trusted configuration: per-channel Google Play accounts
 *
 * The file is operator-owned and trusted; tasks can only select among the
 * channels it declares.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CredentialsTable } from '../types/index.js';
import { ConfigValidationError } from '../errors/PlayPushError.js';
import { DEFAULT_SCOPE_PREFIX } from '../googleplay/ChannelResolver.js';

// ─── Schema ──────────────────────────────────────────────────────────

export const ChannelCredentialsSchema = z
  .object({
    service_account: z.string().min(1),
    certificate: z.string().min(1),
    package_name: z.string().min(1).optional(),
  })
  .strict();

export const ScriptConfigSchema = z.object({
  google_play_accounts: z.record(ChannelCredentialsSchema).optional(),
  taskcluster_scope_prefix: z.string().min(1).default(DEFAULT_SCOPE_PREFIX),
});

export interface ScriptConfig {
  google_play_accounts?: CredentialsTable;
  taskcluster_scope_prefix: string;
}

export const CONFIG_PATH_ENV = 'PLAYPUSH_CONFIG';

// ─── Loading ─────────────────────────────────────────────────────────

export function parseScriptConfig(raw: unknown, source = 'config'): ScriptConfig {
  const result = ScriptConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigValidationError(`Invalid script config in ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return result.data;
}

/**
 * Load the script config from `filePath`, falling back to $PLAYPUSH_CONFIG.
 */
export async function loadScriptConfig(filePath?: string): Promise<ScriptConfig> {
  const path = filePath ?? process.env[CONFIG_PATH_ENV];
  if (!path) {
    throw new ConfigValidationError(`No config file given and ${CONFIG_PATH_ENV} is not set`);
  }

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(`Cannot read config file ${path}`, { path }, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(`Config file ${path} is not valid JSON`, { path }, { cause: err });
  }
  return parseScriptConfig(json, path);
}
