/**
 * playpush - Data models and types
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export const KnownChannel = {
  aurora: 'aurora',
  beta: 'beta',
  release: 'release',
} as const;
export type KnownChannel = (typeof KnownChannel)[keyof typeof KnownChannel];

export const PlayPushErrorCode = {
  SCOPE_INVALID: 'SCOPE_INVALID',
  CHANNEL_NOT_CONFIGURED: 'CHANNEL_NOT_CONFIGURED',
  UNSUPPORTED_CHANNEL: 'UNSUPPORTED_CHANNEL',
  CONFLICTING_COMMIT_SIGNAL: 'CONFLICTING_COMMIT_SIGNAL',
  CONFIG_INVALID: 'CONFIG_INVALID',
  TASK_INVALID: 'TASK_INVALID',
} as const;
export type PlayPushErrorCode = (typeof PlayPushErrorCode)[keyof typeof PlayPushErrorCode];

// ─── Core Interfaces ─────────────────────────────────────────────────────────

/**
 * Release channel name, e.g. `aurora`, `release` or a custom test channel
 * such as `dep`. Valid channels are the keys of the credentials table.
 */
export type Channel = string;

export interface ChannelCredentials {
  service_account: string;
  /** Path to the service account certificate. Real accounts use a `.p12` file. */
  certificate: string;
  /** Explicit package name for channels outside the built-in table. */
  package_name?: string;
}

export type CredentialsTable = Readonly<Record<Channel, Readonly<ChannelCredentials>>>;

export interface PublishingPayload {
  google_play_track?: string;
  rollout_percentage?: number;
  commit?: boolean;
  /** @deprecated Inverted alias of `commit`. */
  dry_run?: boolean;
  update_gp_strings_from_l10n_store?: boolean;
}

export interface PushApkTask {
  scopes: string[];
  payload: PublishingPayload;
}

/** Architecture label (`x86`, `arm_v15`, ...) to local APK path. */
export type ArtifactSet = Readonly<Record<string, string>>;

export type ApkEntries = { readonly [key: `apk_${string}`]: string };

export interface PushApkConfigFields {
  readonly service_account: string;
  readonly credentials: string;
  readonly package_name: string;
  readonly commit: boolean;
  readonly track: string;
  readonly rollout_percentage?: number;
  readonly do_not_contact_google_play?: true;
  readonly update_gp_strings_from_l10n_store: boolean;
}

export type PushApkConfig = PushApkConfigFields & ApkEntries;

export interface PlayPushErrorInfo {
  code: PlayPushErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}
