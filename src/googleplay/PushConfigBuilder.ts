/**
 * PushConfigBuilder — Turns a pushapk task into the config handed to the Google Play client
 *
 * Flow: resolve channel → look up trusted credentials → package name → commit decision → merge
 * Everything here is synchronous and side-effect free apart from logging.
 */

import type {
  ApkEntries,
  ArtifactSet,
  Channel,
  ChannelCredentials,
  CredentialsTable,
  PublishingPayload,
  PushApkConfig,
  PushApkTask,
} from '../types/index.js';
import { ChannelNotConfiguredError, ConflictingCommitSignalError } from '../errors/PlayPushError.js';
import { createLogger } from '../logger/index.js';
import { DEFAULT_SCOPE_PREFIX, resolveChannel } from './ChannelResolver.js';
import { getPackageName } from './packageNames.js';

const log = createLogger('push-config');

export const DEFAULT_TRACK = 'production';
const CERTIFICATE_EXTENSION = '.p12';

export interface CraftPushApkConfigParams {
  /** Trusted `google_play_accounts` table; may be missing from the script config. */
  accounts: CredentialsTable | undefined;
  task: PushApkTask;
  apks: ArtifactSet;
  scopePrefix?: string;
}

// ─── Credential Lookup ───────────────────────────────────────────────

export function getChannelCredentials(accounts: CredentialsTable | undefined, channel: Channel): Readonly<ChannelCredentials> {
  if (!accounts || Object.keys(accounts).length === 0) {
    throw new ChannelNotConfiguredError('No Google Play accounts are configured', { channel });
  }
  if (!Object.hasOwn(accounts, channel)) {
    throw new ChannelNotConfiguredError(`Channel "${channel}" is not part of the Google Play accounts`, {
      channel,
      configuredChannels: Object.keys(accounts),
    });
  }
  return accounts[channel];
}

export function getServiceAccount(accounts: CredentialsTable | undefined, channel: Channel): string {
  return getChannelCredentials(accounts, channel).service_account;
}

export function getCertificatePath(accounts: CredentialsTable | undefined, channel: Channel): string {
  return getChannelCredentials(accounts, channel).certificate;
}

/** Explicit `package_name` on the account wins over the built-in table. */
export function resolvePackageName(credentials: Readonly<ChannelCredentials>, channel: Channel): string {
  return credentials.package_name ?? getPackageName(channel);
}

/** Test accounts without a real `.p12` certificate must not reach Google Play. */
export function isDryFixtureAccount(credentials: Readonly<ChannelCredentials>): boolean {
  return !credentials.certificate.endsWith(CERTIFICATE_EXTENSION);
}

// ─── Commit Decision ─────────────────────────────────────────────────

/**
 * `dry_run` is the deprecated, inverted form of `commit`. Supplying both is
 * rejected even when they agree; supplying neither means validate only.
 */
export function shouldCommitTransaction(payload: PublishingPayload): boolean {
  const hasDryRun = payload.dry_run !== undefined;
  const hasCommit = payload.commit !== undefined;

  if (hasDryRun && hasCommit) {
    throw new ConflictingCommitSignalError(
      `Payload sets both "commit" (${String(payload.commit)}) and the deprecated "dry_run" (${String(payload.dry_run)})`,
      { commit: payload.commit, dry_run: payload.dry_run },
    );
  }
  if (payload.dry_run !== undefined) {
    return !payload.dry_run;
  }
  return payload.commit ?? false;
}

// ─── Field Merge ─────────────────────────────────────────────────────

function toApkEntries(apks: ArtifactSet): ApkEntries {
  const entries: Record<`apk_${string}`, string> = {};
  for (const [architecture, path] of Object.entries(apks)) {
    entries[`apk_${architecture}`] = path;
  }
  return entries;
}

export function craftPushApkConfig(params: CraftPushApkConfigParams): PushApkConfig {
  const { accounts, task, apks } = params;
  const { payload } = task;

  const channel = resolveChannel(task.scopes, params.scopePrefix ?? DEFAULT_SCOPE_PREFIX);
  const credentials = getChannelCredentials(accounts, channel);
  const packageName = resolvePackageName(credentials, channel);
  const commit = shouldCommitTransaction(payload);
  const doNotContact = isDryFixtureAccount(credentials);

  log.info({ channel, packageName, commit }, 'Push config resolved');
  if (doNotContact) {
    log.warn({ channel }, 'Channel account has no .p12 certificate; Google Play will not be contacted');
  }

  const config: PushApkConfig = {
    service_account: credentials.service_account,
    credentials: credentials.certificate,
    package_name: packageName,
    commit,
    track: payload.google_play_track ?? DEFAULT_TRACK,
    ...(payload.rollout_percentage !== undefined && { rollout_percentage: payload.rollout_percentage }),
    ...(doNotContact && { do_not_contact_google_play: true as const }),
    ...toApkEntries(apks),
    update_gp_strings_from_l10n_store: payload.update_gp_strings_from_l10n_store ?? true,
  };

  log.debug({ channel, apks: Object.keys(apks) }, 'APKs attached to push config');
  return Object.freeze(config);
}
