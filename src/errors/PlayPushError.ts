/**
 * playpush - Structured Error Handling
 *
 * Every validation failure is a PlayPushError subclass carrying a catalog code,
 * so callers can tell bad authorization, bad config and ambiguous requests apart.
 */

import { PlayPushErrorCode, type PlayPushErrorInfo } from '../types/index.js';
import { getCatalogEntry } from './catalog.js';

export class PlayPushError extends Error {
  readonly code: PlayPushErrorCode;
  readonly suggestion: string;
  readonly details?: Record<string, unknown>;

  constructor(info: PlayPushErrorInfo, options?: ErrorOptions) {
    super(info.message, options);
    this.code = info.code;
    this.suggestion = info.suggestion ?? getCatalogEntry(info.code).suggestion;
    this.details = info.details;
    this.name = 'PlayPushError';
  }
}

/** Zero or several channel scopes on the task. */
export class ScopeValidationError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PlayPushErrorCode.SCOPE_INVALID, message, details });
    this.name = 'ScopeValidationError';
  }
}

/** Credentials table missing, empty, or without the resolved channel. */
export class ChannelNotConfiguredError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PlayPushErrorCode.CHANNEL_NOT_CONFIGURED, message, details });
    this.name = 'ChannelNotConfiguredError';
  }
}

export class UnsupportedChannelError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PlayPushErrorCode.UNSUPPORTED_CHANNEL, message, details });
    this.name = 'UnsupportedChannelError';
  }
}

/** Both `commit` and the deprecated `dry_run` were supplied. */
export class ConflictingCommitSignalError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: PlayPushErrorCode.CONFLICTING_COMMIT_SIGNAL, message, details });
    this.name = 'ConflictingCommitSignalError';
  }
}

export class ConfigValidationError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super({ code: PlayPushErrorCode.CONFIG_INVALID, message, details }, options);
    this.name = 'ConfigValidationError';
  }
}

export class TaskValidationError extends PlayPushError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super({ code: PlayPushErrorCode.TASK_INVALID, message, details }, options);
    this.name = 'TaskValidationError';
  }
}

/**
 * Render an error for a failure report: `[CODE] message` followed by the suggestion.
 */
export function formatError(error: unknown): string {
  if (error instanceof PlayPushError) {
    return `[${error.code}] ${error.message}\nSuggestion: ${error.suggestion}`;
  }
  return error instanceof Error ? error.message : String(error);
}
