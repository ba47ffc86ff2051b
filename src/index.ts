/**
 * playpush - Google Play push config resolution
 *
 * Public API; the CLI lives in ./cli/index.ts.
 */

export { resolveChannel, DEFAULT_SCOPE_PREFIX } from './googleplay/ChannelResolver.js';
export { getPackageName, CHANNEL_PACKAGE_NAMES } from './googleplay/packageNames.js';
export {
  craftPushApkConfig,
  getChannelCredentials,
  getServiceAccount,
  getCertificatePath,
  resolvePackageName,
  isDryFixtureAccount,
  shouldCommitTransaction,
  DEFAULT_TRACK,
} from './googleplay/PushConfigBuilder.js';
export type { CraftPushApkConfigParams } from './googleplay/PushConfigBuilder.js';
export { loadScriptConfig, parseScriptConfig } from './config/ScriptConfig.js';
export type { ScriptConfig } from './config/ScriptConfig.js';
export { loadTask, parseTask } from './task/Task.js';
export {
  PlayPushError,
  ScopeValidationError,
  ChannelNotConfiguredError,
  UnsupportedChannelError,
  ConflictingCommitSignalError,
  ConfigValidationError,
  TaskValidationError,
  formatError,
} from './errors/PlayPushError.js';
export * from './types/index.js';
