/**
 * playpush - Error Catalog
 *
 * Maps error codes to operator-facing messages and suggestions.
 */

import type { PlayPushErrorCode } from '../types/index.js';

export interface ErrorCatalogEntry {
  userMessage: string;
  suggestion: string;
}

export const ERROR_CATALOG: Readonly<Record<PlayPushErrorCode, ErrorCatalogEntry>> = {
  SCOPE_INVALID: {
    userMessage: 'Task is not authorized for exactly one Google Play channel.',
    suggestion: 'Give the task a single "project:releng:googleplay:<channel>" scope.',
  },
  CHANNEL_NOT_CONFIGURED: {
    userMessage: 'Channel has no Google Play account in the trusted configuration.',
    suggestion: 'Add the channel under "google_play_accounts" in the script configuration.',
  },
  UNSUPPORTED_CHANNEL: {
    userMessage: 'Channel has no known package name.',
    suggestion: 'Use aurora, beta or release, or set "package_name" on the channel account.',
  },
  CONFLICTING_COMMIT_SIGNAL: {
    userMessage: 'Task payload sets both "commit" and the deprecated "dry_run".',
    suggestion: 'Remove "dry_run" from the payload and keep only "commit".',
  },
  CONFIG_INVALID: {
    userMessage: 'Script configuration could not be loaded.',
    suggestion: 'Check that the configuration file exists and matches the expected schema.',
  },
  TASK_INVALID: {
    userMessage: 'Task definition could not be loaded.',
    suggestion: 'Check that the task file is JSON with "scopes" and "payload".',
  },
};

export function getCatalogEntry(code: PlayPushErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}
