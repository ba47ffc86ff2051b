import { describe, it, expect } from 'vitest';
import { resolveChannel, DEFAULT_SCOPE_PREFIX } from './ChannelResolver.js';
import { ScopeValidationError } from '../errors/PlayPushError.js';

describe('resolveChannel', () => {
  it('should return the channel of the single googleplay scope', () => {
    for (const channel of ['aurora', 'beta', 'release', 'dep']) {
      expect(resolveChannel([`project:releng:googleplay:${channel}`])).toBe(channel);
    }
  });

  it('should ignore scopes with other prefixes', () => {
    const scopes = ['project:releng:signing:cert:release', 'project:releng:googleplay:beta', 'queue:route:foo'];
    expect(resolveChannel(scopes)).toBe('beta');
  });

  it('should throw ScopeValidationError when no scope matches', () => {
    expect(() => resolveChannel([])).toThrow(ScopeValidationError);
    expect(() => resolveChannel(['project:releng:signing:cert:release'])).toThrow(ScopeValidationError);
  });

  it('should throw ScopeValidationError when several channels match', () => {
    const scopes = ['project:releng:googleplay:aurora', 'project:releng:googleplay:release'];
    expect(() => resolveChannel(scopes)).toThrow(ScopeValidationError);
    expect(() => resolveChannel(scopes)).toThrow(
      'Task is authorized for 2 channels, expected exactly one: project:releng:googleplay:aurora, project:releng:googleplay:release',
    );
  });

  it('should count a repeated scope once', () => {
    const scopes = ['project:releng:googleplay:release', 'project:releng:googleplay:release'];
    expect(resolveChannel(scopes)).toBe('release');
  });

  it('should accept any iterable, including a Set', () => {
    expect(resolveChannel(new Set(['project:releng:googleplay:aurora']))).toBe('aurora');
  });

  it('should reject a scope that is only the prefix', () => {
    expect(() => resolveChannel([DEFAULT_SCOPE_PREFIX])).toThrow(ScopeValidationError);
  });

  it('should honor a custom prefix', () => {
    expect(resolveChannel(['project:mobile:googleplay:nightly'], 'project:mobile:googleplay:')).toBe('nightly');
    expect(() => resolveChannel(['project:releng:googleplay:nightly'], 'project:mobile:googleplay:')).toThrow(
      ScopeValidationError,
    );
  });

  it('should carry the SCOPE_INVALID code', () => {
    try {
      resolveChannel([]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ScopeValidationError);
      expect(err).toMatchObject({ code: 'SCOPE_INVALID', name: 'ScopeValidationError' });
    }
  });
});
