/**
 * ChannelResolver — Extracts the release channel a task is authorized for
 *
 * A task must carry exactly one `project:releng:googleplay:<channel>` scope.
 * Whether the channel is configured is checked later by the config builder.
 */

import type { Channel } from '../types/index.js';
import { ScopeValidationError } from '../errors/PlayPushError.js';

export const DEFAULT_SCOPE_PREFIX = 'project:releng:googleplay:';

export function resolveChannel(scopes: Iterable<string>, scopePrefix: string = DEFAULT_SCOPE_PREFIX): Channel {
  const matching = [...new Set(scopes)].filter(scope => scope.startsWith(scopePrefix));

  if (matching.length === 0) {
    throw new ScopeValidationError(`No scope starting with "${scopePrefix}" found`, { scopePrefix });
  }
  if (matching.length > 1) {
    throw new ScopeValidationError(
      `Task is authorized for ${matching.length} channels, expected exactly one: ${matching.join(', ')}`,
      { scopePrefix, scopes: matching },
    );
  }

  const channel = matching[0].slice(scopePrefix.length);
  if (channel === '') {
    throw new ScopeValidationError(`Scope "${matching[0]}" does not name a channel`, { scopePrefix });
  }
  return channel;
}
