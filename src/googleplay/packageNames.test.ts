import { describe, it, expect } from 'vitest';
import { getPackageName } from './packageNames.js';
import { UnsupportedChannelError } from '../errors/PlayPushError.js';

describe('getPackageName', () => {
  it('should map known channels to their package names', () => {
    expect(getPackageName('aurora')).toBe('org.mozilla.fennec_aurora');
    expect(getPackageName('beta')).toBe('org.mozilla.firefox_beta');
    expect(getPackageName('release')).toBe('org.mozilla.firefox');
  });

  it('should throw UnsupportedChannelError for other channels', () => {
    expect(() => getPackageName('dep')).toThrow(UnsupportedChannelError);
    expect(() => getPackageName('dep')).toThrow('No package name is known for channel "dep"');
  });

  it('should not resolve inherited object keys as channels', () => {
    expect(() => getPackageName('toString')).toThrow(UnsupportedChannelError);
    expect(() => getPackageName('constructor')).toThrow(UnsupportedChannelError);
  });
});
